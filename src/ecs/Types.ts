/** Entity ids are handed out in increasing order, starting at 1. 0 means "no entity". */
export type Entity = number;

// Constructor used as the component's type token.
export type ComponentCtor<T> = abstract new (...args: never[]) => T;
