import fs from 'fs/promises';
import { IOError, ParseError } from '../errors';
import { Post } from '../types';

export const DEFAULT_AUTHOR = 'Anonymous';

/**
 * Load/save contract for the whole post collection.
 * Every call reads or writes the full collection; nothing is cached between calls.
 */
export interface PostRepository {
  load(): Promise<Post[]>;
  save(posts: Post[]): Promise<void>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Older records may lack author/likes
const toPost = (raw: unknown, source: string): Post => {
  if (!isRecord(raw) || typeof raw.id !== 'number') {
    throw new ParseError(source, { reason: 'holds a record without a numeric id' });
  }

  return {
    id: raw.id,
    title: typeof raw.title === 'string' ? raw.title : '',
    content: typeof raw.content === 'string' ? raw.content : '',
    author: typeof raw.author === 'string' ? raw.author : DEFAULT_AUTHOR,
    likes: typeof raw.likes === 'number' ? raw.likes : 0,
  };
};

export const parsePosts = (text: string, source: string): Post[] => {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ParseError(source, { cause: error });
  }

  if (!Array.isArray(data)) {
    throw new ParseError(source);
  }
  return data.map((entry: unknown) => toPost(entry, source));
};

export const serializePosts = (posts: Post[]): string => JSON.stringify(posts, null, 4);

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Posts kept in a single JSON file, rewritten in place on every save.
 * No temp file, rename or fsync: a crash mid-write can truncate the file.
 */
export class JsonFileRepository implements PostRepository {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Post[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw new IOError(`Could not read posts file: ${this.filePath}`, this.filePath, { cause: error });
    }
    return parsePosts(text, this.filePath);
  }

  async save(posts: Post[]): Promise<void> {
    try {
      await fs.writeFile(this.filePath, serializePosts(posts), 'utf-8');
    } catch (error) {
      throw new IOError(`Could not write posts file: ${this.filePath}`, this.filePath, { cause: error });
    }
    console.log(`[store] Saved ${posts.length} posts to ${this.filePath}`);
  }
}

/** Repository held in memory, serialized like the file so callers never share references with it */
export class InMemoryRepository implements PostRepository {
  private text: string | null;
  saveCount = 0;

  constructor(initial?: Post[]) {
    this.text = initial ? serializePosts(initial) : null;
  }

  async load(): Promise<Post[]> {
    return this.text === null ? [] : parsePosts(this.text, 'memory');
  }

  async save(posts: Post[]): Promise<void> {
    this.text = serializePosts(posts);
    this.saveCount++;
  }

  /** Raw serialized collection, null before the first save */
  snapshot(): string | null {
    return this.text;
  }
}
