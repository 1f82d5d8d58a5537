import { v1 as uuidv1 } from 'uuid';
import { Blog, Result, failure, success } from '../types/domain';
import type { ConnectionChecker } from '../lib/connectionChecker';
import { toErrorMessage } from '../lib/errors';
import type { BlogRemoteDataSource } from './blogRemoteDataSource';
import type { BlogLocalDataSource } from './blogLocalDataSource';

const UPLOAD_FALLBACK_MESSAGE = 'An unexpected error occurred while uploading the blog';
const FETCH_FALLBACK_MESSAGE = 'An unexpected error occurred while fetching blogs';

export type UploadBlogInput = {
  image: Uint8Array;
  imageContentType?: string;
  title: string;
  content: string;
  posterId: string;
  topics: string[];
};

export interface BlogRepository {
  uploadBlog(input: UploadBlogInput): Promise<Result<Blog>>;
  getAllBlogs(): Promise<Result<Blog[]>>;
}

type BlogRepositoryDeps = {
  remote: BlogRemoteDataSource;
  local: BlogLocalDataSource;
  connectionChecker: ConnectionChecker;
  generateId?: () => string;
  now?: () => Date;
};

const messageOr = (error: unknown, fallback: string) => toErrorMessage(error) || fallback;

export class BlogRepositoryImpl implements BlogRepository {
  private readonly remote: BlogRemoteDataSource;
  private readonly local: BlogLocalDataSource;
  private readonly connectionChecker: ConnectionChecker;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor({ remote, local, connectionChecker, generateId, now }: BlogRepositoryDeps) {
    this.remote = remote;
    this.local = local;
    this.connectionChecker = connectionChecker;
    this.generateId = generateId ?? (() => uuidv1());
    this.now = now ?? (() => new Date());
  }

  /**
   * Uploads the image under the new blog's id, then inserts the row.
   * The two calls are not atomic: if the insert fails the uploaded image stays
   * in the bucket.
   */
  async uploadBlog({
    image,
    imageContentType,
    title,
    content,
    posterId,
    topics,
  }: UploadBlogInput): Promise<Result<Blog>> {
    try {
      let blog: Blog = {
        id: this.generateId(),
        posterId,
        title,
        content,
        imageUrl: '',
        topics,
        updatedAt: this.now().toISOString(),
      };

      const imageUrl = await this.remote.uploadBlogImage({
        image,
        blog,
        contentType: imageContentType,
      });
      blog = { ...blog, imageUrl };

      const uploaded = await this.remote.uploadBlog(blog);
      return success(uploaded);
    } catch (error) {
      return failure(messageOr(error, UPLOAD_FALLBACK_MESSAGE));
    }
  }

  async getAllBlogs(): Promise<Result<Blog[]>> {
    let isConnected: boolean;
    try {
      isConnected = await this.connectionChecker.isConnected();
    } catch (error) {
      return failure(messageOr(error, FETCH_FALLBACK_MESSAGE));
    }

    if (!isConnected) {
      try {
        return success(await this.local.loadBlogs());
      } catch (error) {
        return failure(messageOr(error, FETCH_FALLBACK_MESSAGE));
      }
    }

    let blogs: Blog[];
    try {
      blogs = await this.remote.getAllBlogs();
    } catch (error) {
      return failure(messageOr(error, FETCH_FALLBACK_MESSAGE));
    }

    try {
      await this.local.uploadLocalBlogs(blogs);
    } catch (error) {
      console.warn('Fetched blogs could not be cached for offline use', error);
    }

    return success(blogs);
  }
}
