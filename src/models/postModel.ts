import { NewPost, Post, PostChanges } from '../types';
import { DEFAULT_AUTHOR, PostRepository } from './postRepository';

// max + 1 rather than count + 1, so a new id never collides with a surviving post.
// Deleting the post with the highest id frees that id for the next create.
export const nextId = (posts: Post[]): number =>
  posts.reduce((max, post) => Math.max(max, post.id), 0) + 1;

export class PostStore {
  constructor(private readonly repository: PostRepository) {}

  load(): Promise<Post[]> {
    return this.repository.load();
  }

  save(posts: Post[]): Promise<void> {
    return this.repository.save(posts);
  }

  async fetchById(id: number): Promise<Post | null> {
    const posts = await this.load();
    return posts.find(post => post.id === id) ?? null;
  }

  async create(data: NewPost): Promise<Post> {
    const posts = await this.load();

    const post: Post = {
      id: nextId(posts),
      title: data.title,
      content: data.content,
      author: data.author ?? DEFAULT_AUTHOR,
      likes: 0,
    };

    posts.push(post);
    await this.save(posts);
    return post;
  }

  async update(id: number, changes: PostChanges): Promise<Post | null> {
    const posts = await this.load();
    const post = posts.find(p => p.id === id);
    if (!post) return null;

    if (changes.title !== undefined) post.title = changes.title;
    if (changes.content !== undefined) post.content = changes.content;
    if (changes.author !== undefined) post.author = changes.author;

    await this.save(posts);
    return post;
  }

  /** Saves even when nothing matched */
  async delete(id: number): Promise<void> {
    const posts = await this.load();
    await this.save(posts.filter(post => post.id !== id));
  }

  async like(id: number): Promise<Post | null> {
    const posts = await this.load();
    const post = posts.find(p => p.id === id);
    if (!post) return null;

    post.likes += 1;
    await this.save(posts);
    return post;
  }
}
