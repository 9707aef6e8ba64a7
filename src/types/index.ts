export interface Post {
    id: number;
    title: string;
    content: string;
    author: string;
    likes: number;
}

export interface NewPost {
    title: string;
    content: string;
    author?: string;
}

export type PostChanges = Partial<Pick<Post, 'title' | 'content' | 'author'>>;
