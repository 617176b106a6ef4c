import { randomInt } from "node:crypto";
import { DEFAULT_PASSWORD_LENGTH, InvalidArgumentError } from "../../core/src/index";

const LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const DIGITS = "0123456789";
// ASCII punctuation without the backslash.
const PUNCTUATION = "!\"#$%&'()*+,-./:;<=>?@[]^_`{|}~";

export const PASSWORD_ALPHABET = `${LETTERS}${DIGITS}${PUNCTUATION}`;

export const generatePassword = (length: number = DEFAULT_PASSWORD_LENGTH): string => {
  if (!Number.isInteger(length) || length <= 0) {
    throw new InvalidArgumentError(`Password length must be a positive integer, got ${String(length)}.`);
  }

  let password = "";
  for (let i = 0; i < length; i += 1) {
    password += PASSWORD_ALPHABET.charAt(randomInt(PASSWORD_ALPHABET.length));
  }
  return password;
};
