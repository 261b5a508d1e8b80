import { AuthorizationError } from '../errors';
import type { DataStore, ListOptions } from '../store';
import type { Note, NotePatch } from '../types';
import { toIso } from '../utils';

export class NoteService {
  constructor(private readonly store: DataStore) {}

  async list(ownerId: number, options: ListOptions): Promise<Note[]> {
    return this.store.listNotesByOwner(ownerId, options);
  }

  async create(ownerId: number, payload: { title: string; content: string }): Promise<Note> {
    return this.store.createNote({
      title: payload.title,
      content: payload.content,
      ownerId,
      createdAt: toIso(Date.now())
    });
  }

  async get(ownerId: number, noteId: number): Promise<Note> {
    return this.assertOwner(ownerId, noteId);
  }

  async update(ownerId: number, noteId: number, patch: NotePatch): Promise<Note> {
    await this.assertOwner(ownerId, noteId);
    const updated = await this.store.updateNote(noteId, patch, toIso(Date.now()));
    if (!updated) {
      throw new AuthorizationError();
    }
    return updated;
  }

  async delete(ownerId: number, noteId: number): Promise<void> {
    await this.assertOwner(ownerId, noteId);
    await this.store.deleteNote(noteId);
  }

  async assertOwner(ownerId: number, noteId: number): Promise<Note> {
    const note = await this.store.getNote(noteId);
    if (!note || note.ownerId !== ownerId) {
      throw new AuthorizationError();
    }
    return note;
  }
}
