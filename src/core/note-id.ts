import { Types } from 'mongoose';

import { InvalidIdentifierError } from './errors.js';

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

/**
 * Convert an external note id to the store's ObjectId.
 * Only the 24-character hex form is accepted.
 */
export function parseNoteId(raw: string): Types.ObjectId {
  if (!OBJECT_ID_PATTERN.test(raw)) {
    throw new InvalidIdentifierError(raw);
  }
  return new Types.ObjectId(raw);
}

export function newNoteId(): Types.ObjectId {
  return new Types.ObjectId();
}
