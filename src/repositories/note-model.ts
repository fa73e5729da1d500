import { Schema, type Connection, type Model, type Types } from 'mongoose';

import type { CategorySummary, Note } from '../types/index.js';

/**
 * Shape of a document in the `notes` collection.
 */
export interface NoteDocument {
  _id: Types.ObjectId;
  category: string;
  content: string; // markdown
  created_at: Date;
  updated_at: Date;
}

/**
 * Row produced by the category aggregation pipeline.
 */
export interface CategoryRow {
  _id: string;
  count: number;
  last_note: Date;
}

export type NoteModel = Model<NoteDocument>;

export const noteSchema = new Schema<NoteDocument>(
  {
    category: { type: String, required: true },
    content: { type: String, required: true },
    created_at: { type: Date, required: true },
    updated_at: { type: Date, required: true },
  },
  {
    collection: 'notes',
    versionKey: false,
    autoIndex: false,
  }
);

noteSchema.index({ content: 'text' });
noteSchema.index({ category: 1 });
noteSchema.index({ created_at: -1 });
noteSchema.index({ category: 1, created_at: -1 });

export function createNoteModel(connection: Connection): NoteModel {
  return connection.model<NoteDocument>('Note', noteSchema);
}

export function toNote(doc: NoteDocument): Note {
  return {
    id: doc._id.toHexString(),
    category: doc.category,
    content: doc.content,
    createdAt: new Date(doc.created_at),
    updatedAt: new Date(doc.updated_at),
  };
}

export function toCategorySummary(row: CategoryRow): CategorySummary {
  return {
    name: row._id,
    count: row.count,
    lastNote: row.last_note,
  };
}
