export const DATA_SOURCE_CLIENT: unique symbol = Symbol('DATA_SOURCE_CLIENT');
