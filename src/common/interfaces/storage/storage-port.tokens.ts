export const USER_SETTINGS_STORE: unique symbol = Symbol('USER_SETTINGS_STORE');
