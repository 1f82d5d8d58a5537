import { Blog } from '../types/domain';

export type BlogRow = {
  id: string;
  poster_id: string;
  title: string;
  content: string;
  image_url: string;
  topics: string[];
  updated_at: string;
};

export type CachedBlogRow = BlogRow & {
  poster_name?: string;
};

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readString = (row: UnknownRecord, key: string): string | null => {
  const value = row[key];
  return typeof value === 'string' ? value : null;
};

// The profile join comes back as an object, or as a one-element array
// when the relationship is not detected as to-one.
const readJoinedPosterName = (row: UnknownRecord, joinKey: string): string | undefined => {
  const relation = row[joinKey];
  const joined = Array.isArray(relation) ? relation[0] : relation;
  if (!isRecord(joined)) return undefined;
  return readString(joined, 'name') ?? undefined;
};

export const mapBlogToRow = (blog: Blog): BlogRow => ({
  id: blog.id,
  poster_id: blog.posterId,
  title: blog.title,
  content: blog.content,
  image_url: blog.imageUrl,
  topics: blog.topics,
  updated_at: blog.updatedAt,
});

export const mapBlogToCacheRow = (blog: Blog): CachedBlogRow => ({
  ...mapBlogToRow(blog),
  ...(blog.posterName !== undefined ? { poster_name: blog.posterName } : {}),
});

/**
 * Maps a stored row (backend response or cache entry) into a Blog.
 * `profileJoinKey` names the embedded profile relation of a fetch-all row.
 * Returns null when the identifying fields are missing.
 */
export const mapRowToBlog = (row: unknown, profileJoinKey = 'profiles'): Blog | null => {
  if (!isRecord(row)) return null;

  const id = readString(row, 'id');
  const posterId = readString(row, 'poster_id');
  if (!id || posterId === null) return null;

  const topics = Array.isArray(row.topics)
    ? row.topics.filter((topic): topic is string => typeof topic === 'string')
    : [];
  const posterName = readString(row, 'poster_name') ?? readJoinedPosterName(row, profileJoinKey);

  return {
    id,
    posterId,
    title: readString(row, 'title') ?? '',
    content: readString(row, 'content') ?? '',
    imageUrl: readString(row, 'image_url') ?? '',
    topics,
    updatedAt: readString(row, 'updated_at') ?? new Date(0).toISOString(),
    ...(posterName !== undefined ? { posterName } : {}),
  };
};
