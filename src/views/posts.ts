import { Post } from '../types';
import { escape, layout } from './layout';

const postItem = (post: Post): string => `    <article class="post">
      <h2>${escape(post.title)}</h2>
      <p class="author">Written by ${escape(post.author)}</p>
      <p>${escape(post.content)}</p>
      <p class="likes">Likes: ${post.likes}</p>
      <a href="/update/${post.id}">Edit</a>
      <form action="/delete/${post.id}" method="post"><button type="submit">Delete</button></form>
      <form action="/like/${post.id}" method="post"><button type="submit">Like</button></form>
    </article>`;

export const renderIndex = (posts: Post[]): string => layout('Blog', `  <h1>Welcome to the blog</h1>
  <a href="/add">Add a new post</a>
  <main>
${posts.length > 0 ? posts.map(postItem).join('\n') : '    <p>No posts yet.</p>'}
  </main>`);

interface FormValues {
  title: string;
  content: string;
  author: string;
}

const postForm = (action: string, values: FormValues, submitLabel: string): string => `  <form action="${action}" method="post">
    <label>Title <input type="text" name="title" value="${escape(values.title)}" required></label>
    <label>Author <input type="text" name="author" value="${escape(values.author)}"></label>
    <label>Content <textarea name="content" required>${escape(values.content)}</textarea></label>
    <button type="submit">${submitLabel}</button>
  </form>`;

export const renderAdd = (): string => layout('Add post', `  <h1>Add a new post</h1>
${postForm('/add', { title: '', content: '', author: '' }, 'Add post')}`);

export const renderUpdate = (post: Post): string => layout(`Edit ${post.title}`, `  <h1>Edit post</h1>
${postForm(`/update/${post.id}`, post, 'Update post')}`);
