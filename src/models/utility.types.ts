export type Undefined<T> = T | undefined;
export type Nullable<T> = T | null;
export type Milliseconds = number;
