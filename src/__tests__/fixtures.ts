import { Blog } from '../types/domain';
import type { ConnectionChecker } from '../lib/connectionChecker';
import type {
  BlogRemoteDataSource,
  UploadBlogImageInput,
} from '../services/blogRemoteDataSource';
import { ServerException } from '../lib/errors';

export const makeBlog = (overrides: Partial<Blog> = {}): Blog => ({
  id: 'blog-1',
  posterId: 'u1',
  title: 'Hello',
  content: 'World',
  imageUrl: 'https://storage.test/blog_images/blog-1',
  topics: ['Tech'],
  updatedAt: '2026-10-19T08:30:00.000Z',
  ...overrides,
});

export class FakeConnectionChecker implements ConnectionChecker {
  calls = 0;

  constructor(public connected = true) {}

  async isConnected(): Promise<boolean> {
    this.calls += 1;
    return this.connected;
  }
}

export class FakeBlogRemoteDataSource implements BlogRemoteDataSource {
  storedBlogs: Blog[] = [];
  uploadedImageKeys: string[] = [];
  insertedBlogs: Blog[] = [];
  getAllBlogsCalls = 0;
  imageUploadError: Error | null = null;
  insertError: Error | null = null;
  fetchError: Error | null = null;

  async uploadBlogImage({ blog }: UploadBlogImageInput): Promise<string> {
    if (this.imageUploadError) throw this.imageUploadError;
    this.uploadedImageKeys.push(blog.id);
    return `https://storage.test/blog_images/${blog.id}`;
  }

  async uploadBlog(blog: Blog): Promise<Blog> {
    if (this.insertError) throw this.insertError;
    this.insertedBlogs.push(blog);
    return { ...blog };
  }

  async getAllBlogs(): Promise<Blog[]> {
    this.getAllBlogsCalls += 1;
    if (this.fetchError) throw this.fetchError;
    return this.storedBlogs.map((blog) => ({ ...blog, topics: [...blog.topics] }));
  }
}

export const serverError = (message: string) => new ServerException(message);
