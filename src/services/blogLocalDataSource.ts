import { Blog } from '../types/domain';
import type { StorageAdapter } from '../storage/StorageAdapter';
import { CacheException, toErrorMessage } from '../lib/errors';
import { mapBlogToCacheRow, mapRowToBlog } from '../utils/blogMapper';

export const BLOGS_CACHE_KEY = 'blogs';

export interface BlogLocalDataSource {
  uploadLocalBlogs(blogs: Blog[]): Promise<void>;
  loadBlogs(): Promise<Blog[]>;
}

export class StorageBlogLocalDataSource implements BlogLocalDataSource {
  constructor(private readonly box: StorageAdapter) {}

  async uploadLocalBlogs(blogs: Blog[]): Promise<void> {
    try {
      await this.box.put(BLOGS_CACHE_KEY, blogs.map(mapBlogToCacheRow));
    } catch (error) {
      console.error('Error saving blogs to local cache:', error);
      throw new CacheException(toErrorMessage(error));
    }
  }

  async loadBlogs(): Promise<Blog[]> {
    let cached: unknown;
    try {
      cached = await this.box.get(BLOGS_CACHE_KEY);
    } catch (error) {
      console.error('Error loading blogs from local cache:', error);
      throw new CacheException(toErrorMessage(error));
    }

    if (!Array.isArray(cached)) {
      return [];
    }

    const rows: unknown[] = cached;
    return rows
      .map((row) => mapRowToBlog(row))
      .filter((blog): blog is Blog => blog !== null);
  }
}
