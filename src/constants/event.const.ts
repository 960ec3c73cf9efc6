export const PROTECTION_STATE_CHANGED_EVENT = 'protectionStateChanged';
