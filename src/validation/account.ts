import config from '../config.js';
import validateInteger from './integer.js';
import validateString from './string.js';

/** Account names follow the lowercase username charset; dots and dashes only in the middle. */
export function accountName(value: unknown): value is string {
    return validateString(
        value,
        config.usernameMaxLength,
        config.usernameMinLength,
        'abcdefghijklmnopqrstuvwxyz0123456789',
        config.allowedUsernameChars
    );
}

/** Token ids are assigned sequentially from 1. */
export function tokenId(value: unknown): value is number {
    return validateInteger(value, false, false);
}
