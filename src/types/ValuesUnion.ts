/**
 * Union of the property values of an object type
 */
export type ValuesUnion<T> = T[keyof T];
