/**
 * Identifier Generator
 *
 * File ids are 16 hex chars (64 bits). Legacy share codes are 8 chars of
 * [a-z0-9]. Both are pure randomness; collisions are caught by the unique
 * constraints in the store and retried by the caller.
 */

import { customAlphabet } from 'nanoid';

export const FILE_ID_LENGTH = 16;
export const SHARE_CODE_LENGTH = 8;

const FILE_ID_ALPHABET = '0123456789abcdef';
const SHARE_CODE_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

export interface IdGenerator {
  newFileId: () => string;
  newShareCode: () => string;
}

export const newFileId = customAlphabet(FILE_ID_ALPHABET, FILE_ID_LENGTH);
export const newShareCode = customAlphabet(
  SHARE_CODE_ALPHABET,
  SHARE_CODE_LENGTH
);

export const defaultIdGenerator: IdGenerator = {
  newFileId: () => newFileId(),
  newShareCode: () => newShareCode(),
};
