export type Tag =
  | 'init'
  | 'configuration'
  | 'exchange'
  | 'retry'
  | 'placement'
  | 'protection'
  | 'supervisor'
  | 'reconciler'
  | 'journal'
  | 'desk';
