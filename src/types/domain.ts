export type Blog = {
  id: string;
  posterId: string;
  title: string;
  content: string;
  imageUrl: string;
  topics: string[];
  updatedAt: string; // ISO timestamp
  /** Joined from the profile table on fetch; never set on a freshly created blog. */
  posterName?: string;
};

export type User = {
  id: string;
  name: string;
  email: string;
};

export type Failure = {
  message: string;
};

export type Result<T> =
  | { ok: true; data: T }
  | { ok: false; error: Failure };

export const success = <T>(data: T): Result<T> => ({ ok: true, data });

export const failure = <T = never>(message: string): Result<T> => ({
  ok: false,
  error: { message },
});

export const BLOG_TOPICS = ['Technology', 'Business', 'Programming', 'Entertainment'] as const;
