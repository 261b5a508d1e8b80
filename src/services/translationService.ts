import { KeyedLock } from '../keyedLock';
import type { Logger } from '../logger';
import { SOURCE_LANGUAGE, TARGET_LANGUAGE, needsTranslation } from '../sourceScript';
import type { DataStore } from '../store';
import type { Note } from '../types';
import { toIso } from '../utils';
import type { NoteService } from './noteService';
import type { TranslationProvider } from './translationProvider';

export interface TranslationPreview {
  translatedText: string;
  originalText: string;
  note: Note;
}

export class TranslationService {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly store: DataStore,
    private readonly notes: NoteService,
    private readonly provider: TranslationProvider,
    private readonly logger: Logger
  ) {}

  async translateAndPersist(ownerId: number, noteId: number): Promise<Note> {
    await this.notes.assertOwner(ownerId, noteId);

    return this.lock.run(String(noteId), async () => {
      // Re-read under the lock: a caller queued behind another translation
      // must see the translated state and skip the provider.
      const note = await this.notes.assertOwner(ownerId, noteId);
      if (note.isTranslated || !needsTranslation(note.content)) {
        return note;
      }

      const translated = await this.provider.translate(note.content, {
        source: SOURCE_LANGUAGE,
        target: TARGET_LANGUAGE
      });

      const written = await this.store.markNoteTranslated(noteId, {
        expectedContent: note.content,
        translatedContent: translated,
        updatedAt: toIso(Date.now())
      });
      if (written) {
        this.logger.info({ noteId, provider: this.provider.name }, 'note translated');
        return written;
      }

      this.logger.warn({ noteId }, 'note changed while translating; keeping the stored state');
      return this.notes.assertOwner(ownerId, noteId);
    });
  }

  async translatePreview(ownerId: number, noteId: number): Promise<TranslationPreview> {
    const note = await this.notes.assertOwner(ownerId, noteId);
    const translatedText = needsTranslation(note.content)
      ? await this.provider.translate(note.content, {
          source: SOURCE_LANGUAGE,
          target: TARGET_LANGUAGE
        })
      : note.content;
    return { translatedText, originalText: note.content, note };
  }
}
