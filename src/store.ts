import { DatabaseError, Pool } from 'pg';
import { ConfigurationError, DuplicateUserError } from './errors';
import type { NewNote, NewUser, Note, NotePatch, TranslationWrite, User } from './types';

export type StoreKind = 'memory' | 'postgres';

export interface ListOptions {
  skip: number;
  limit: number;
}

export interface DataStore {
  init(): Promise<void>;
  close(): Promise<void>;

  createUser(user: NewUser): Promise<User>;
  getUserById(userId: number): Promise<User | undefined>;
  getUserByUsername(username: string): Promise<User | undefined>;
  getUserByEmail(email: string): Promise<User | undefined>;
  setUserActive(userId: number, active: boolean, updatedAt: string): Promise<void>;

  createNote(note: NewNote): Promise<Note>;
  getNote(noteId: number): Promise<Note | undefined>;
  listNotesByOwner(ownerId: number, options: ListOptions): Promise<Note[]>;
  updateNote(noteId: number, patch: NotePatch, updatedAt: string): Promise<Note | undefined>;
  /**
   * Compare-and-swap into the translated state: succeeds only while the note
   * is untranslated and still holds `expectedContent`. Returns undefined when
   * the precondition no longer holds.
   */
  markNoteTranslated(noteId: number, write: TranslationWrite): Promise<Note | undefined>;
  deleteNote(noteId: number): Promise<boolean>;
}

export class InMemoryStore implements DataStore {
  usersById = new Map<number, User>();
  notesById = new Map<number, Note>();
  private nextUserId = 1;
  private nextNoteId = 1;

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async createUser(input: NewUser): Promise<User> {
    for (const existing of this.usersById.values()) {
      if (existing.username === input.username) {
        throw new DuplicateUserError('username');
      }
      if (existing.email === input.email) {
        throw new DuplicateUserError('email');
      }
    }
    const user: User = {
      id: this.nextUserId++,
      username: input.username,
      email: input.email,
      passwordHash: input.passwordHash,
      isActive: true,
      createdAt: input.createdAt,
      updatedAt: input.createdAt
    };
    this.usersById.set(user.id, user);
    return { ...user };
  }

  async getUserById(userId: number): Promise<User | undefined> {
    const user = this.usersById.get(userId);
    return user ? { ...user } : undefined;
  }

  async getUserByUsername(username: string): Promise<User | undefined> {
    for (const user of this.usersById.values()) {
      if (user.username === username) {
        return { ...user };
      }
    }
    return undefined;
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    for (const user of this.usersById.values()) {
      if (user.email === email) {
        return { ...user };
      }
    }
    return undefined;
  }

  async setUserActive(userId: number, active: boolean, updatedAt: string): Promise<void> {
    const user = this.usersById.get(userId);
    if (!user) {
      return;
    }
    this.usersById.set(userId, { ...user, isActive: active, updatedAt });
  }

  async createNote(input: NewNote): Promise<Note> {
    const note: Note = {
      id: this.nextNoteId++,
      title: input.title,
      content: input.content,
      isTranslated: false,
      originalContent: null,
      ownerId: input.ownerId,
      createdAt: input.createdAt,
      updatedAt: input.createdAt
    };
    this.notesById.set(note.id, note);
    return { ...note };
  }

  async getNote(noteId: number): Promise<Note | undefined> {
    const note = this.notesById.get(noteId);
    return note ? { ...note } : undefined;
  }

  async listNotesByOwner(ownerId: number, options: ListOptions): Promise<Note[]> {
    return [...this.notesById.values()]
      .filter((note) => note.ownerId === ownerId)
      .sort((a, b) => a.id - b.id)
      .slice(options.skip, options.skip + options.limit)
      .map((note) => ({ ...note }));
  }

  async updateNote(noteId: number, patch: NotePatch, updatedAt: string): Promise<Note | undefined> {
    const current = this.notesById.get(noteId);
    if (!current) {
      return undefined;
    }
    const next: Note = { ...current, updatedAt };
    if (patch.title !== undefined) {
      next.title = patch.title;
    }
    if (patch.content !== undefined) {
      next.content = patch.content;
      next.isTranslated = false;
      next.originalContent = null;
    }
    this.notesById.set(noteId, next);
    return { ...next };
  }

  async markNoteTranslated(noteId: number, write: TranslationWrite): Promise<Note | undefined> {
    const current = this.notesById.get(noteId);
    if (!current || current.isTranslated || current.content !== write.expectedContent) {
      return undefined;
    }
    const next: Note = {
      ...current,
      originalContent: current.content,
      content: write.translatedContent,
      isTranslated: true,
      updatedAt: write.updatedAt
    };
    this.notesById.set(noteId, next);
    return { ...next };
  }

  async deleteNote(noteId: number): Promise<boolean> {
    return this.notesById.delete(noteId);
  }
}

type UserRow = {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
};

type NoteRow = {
  id: number;
  title: string;
  content: string;
  is_translated: boolean;
  original_content: string | null;
  owner_id: number;
  created_at: Date;
  updated_at: Date;
};

const UNIQUE_VIOLATION = '23505';

export function mapUniqueViolation(err: unknown): unknown {
  if (!(err instanceof DatabaseError) || err.code !== UNIQUE_VIOLATION) {
    return err;
  }
  if (err.constraint === 'users_username_key') {
    return new DuplicateUserError('username');
  }
  if (err.constraint === 'users_email_key') {
    return new DuplicateUserError('email');
  }
  return err;
}

function toUser(row: UserRow): User {
  return {
    id: Number(row.id),
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    isActive: row.is_active,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

function toNote(row: NoteRow): Note {
  return {
    id: Number(row.id),
    title: row.title,
    content: row.content,
    isTranslated: row.is_translated,
    originalContent: row.original_content,
    ownerId: Number(row.owner_id),
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

export class PostgresStore implements DataStore {
  private readonly pool: Pool;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS users (
        id SERIAL PRIMARY KEY,
        username VARCHAR(50) NOT NULL CONSTRAINT users_username_key UNIQUE,
        email VARCHAR(100) NOT NULL CONSTRAINT users_email_key UNIQUE,
        password_hash VARCHAR(255) NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL
      );

      CREATE TABLE IF NOT EXISTS notes (
        id SERIAL PRIMARY KEY,
        title VARCHAR(100) NOT NULL,
        content TEXT NOT NULL,
        is_translated BOOLEAN NOT NULL DEFAULT FALSE,
        original_content TEXT,
        owner_id INTEGER NOT NULL REFERENCES users(id),
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL,
        CONSTRAINT notes_translation_state CHECK (is_translated = (original_content IS NOT NULL))
      );

      CREATE INDEX IF NOT EXISTS notes_owner_idx ON notes(owner_id);
    `);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async createUser(input: NewUser): Promise<User> {
    try {
      const { rows } = await this.pool.query<UserRow>(
        `INSERT INTO users(username, email, password_hash, is_active, created_at, updated_at)
         VALUES ($1,$2,$3,TRUE,$4,$4)
         RETURNING *`,
        [input.username, input.email, input.passwordHash, input.createdAt]
      );
      return toUser(rows[0]);
    } catch (err) {
      throw mapUniqueViolation(err);
    }
  }

  async getUserById(userId: number): Promise<User | undefined> {
    const { rows } = await this.pool.query<UserRow>('SELECT * FROM users WHERE id = $1', [userId]);
    const row = rows[0];
    return row ? toUser(row) : undefined;
  }

  async getUserByUsername(username: string): Promise<User | undefined> {
    const { rows } = await this.pool.query<UserRow>('SELECT * FROM users WHERE username = $1', [
      username
    ]);
    const row = rows[0];
    return row ? toUser(row) : undefined;
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    const { rows } = await this.pool.query<UserRow>('SELECT * FROM users WHERE email = $1', [email]);
    const row = rows[0];
    return row ? toUser(row) : undefined;
  }

  async setUserActive(userId: number, active: boolean, updatedAt: string): Promise<void> {
    await this.pool.query('UPDATE users SET is_active = $2, updated_at = $3 WHERE id = $1', [
      userId,
      active,
      updatedAt
    ]);
  }

  async createNote(input: NewNote): Promise<Note> {
    const { rows } = await this.pool.query<NoteRow>(
      `INSERT INTO notes(title, content, is_translated, original_content, owner_id, created_at, updated_at)
       VALUES ($1,$2,FALSE,NULL,$3,$4,$4)
       RETURNING *`,
      [input.title, input.content, input.ownerId, input.createdAt]
    );
    return toNote(rows[0]);
  }

  async getNote(noteId: number): Promise<Note | undefined> {
    const { rows } = await this.pool.query<NoteRow>('SELECT * FROM notes WHERE id = $1', [noteId]);
    const row = rows[0];
    return row ? toNote(row) : undefined;
  }

  async listNotesByOwner(ownerId: number, options: ListOptions): Promise<Note[]> {
    const { rows } = await this.pool.query<NoteRow>(
      'SELECT * FROM notes WHERE owner_id = $1 ORDER BY id OFFSET $2 LIMIT $3',
      [ownerId, options.skip, options.limit]
    );
    return rows.map(toNote);
  }

  async updateNote(noteId: number, patch: NotePatch, updatedAt: string): Promise<Note | undefined> {
    const contentChanged = patch.content !== undefined;
    const { rows } = await this.pool.query<NoteRow>(
      `UPDATE notes
          SET title = COALESCE($2, title),
              content = COALESCE($3, content),
              is_translated = CASE WHEN $4 THEN FALSE ELSE is_translated END,
              original_content = CASE WHEN $4 THEN NULL ELSE original_content END,
              updated_at = $5
        WHERE id = $1
        RETURNING *`,
      [noteId, patch.title ?? null, patch.content ?? null, contentChanged, updatedAt]
    );
    const row = rows[0];
    return row ? toNote(row) : undefined;
  }

  async markNoteTranslated(noteId: number, write: TranslationWrite): Promise<Note | undefined> {
    const { rows } = await this.pool.query<NoteRow>(
      `UPDATE notes
          SET original_content = content,
              content = $2,
              is_translated = TRUE,
              updated_at = $3
        WHERE id = $1 AND is_translated = FALSE AND content = $4
        RETURNING *`,
      [noteId, write.translatedContent, write.updatedAt, write.expectedContent]
    );
    const row = rows[0];
    return row ? toNote(row) : undefined;
  }

  async deleteNote(noteId: number): Promise<boolean> {
    const { rowCount } = await this.pool.query('DELETE FROM notes WHERE id = $1', [noteId]);
    return (rowCount ?? 0) > 0;
  }
}

export function createStore(params: { kind: StoreKind; databaseUrl?: string }): DataStore {
  if (params.kind === 'memory') {
    return new InMemoryStore();
  }
  if (!params.databaseUrl) {
    throw new ConfigurationError(
      'InvalidSetting',
      'DATABASE_URL is required when using postgres store'
    );
  }
  return new PostgresStore(params.databaseUrl);
}
