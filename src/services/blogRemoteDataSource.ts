import type { SupabaseClient } from '@supabase/supabase-js';
import { Blog } from '../types/domain';
import { ServerException, toErrorMessage } from '../lib/errors';
import { mapBlogToRow, mapRowToBlog } from '../utils/blogMapper';

export type UploadBlogImageInput = {
  image: Uint8Array;
  blog: Blog;
  contentType?: string;
};

export interface BlogRemoteDataSource {
  uploadBlogImage(input: UploadBlogImageInput): Promise<string>;
  uploadBlog(blog: Blog): Promise<Blog>;
  getAllBlogs(): Promise<Blog[]>;
}

type BlogRemoteDataSourceOptions = {
  blogTable: string;
  profileTable: string;
  imagesBucket: string;
};

const toServerException = (context: string, error: unknown): ServerException => {
  if (error instanceof ServerException) return error;
  console.error(`${context}:`, error);
  return new ServerException(toErrorMessage(error));
};

const readRowId = (row: unknown): unknown =>
  typeof row === 'object' && row !== null && 'id' in row ? row.id : row;

export class SupabaseBlogRemoteDataSource implements BlogRemoteDataSource {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly options: BlogRemoteDataSourceOptions
  ) {}

  async uploadBlogImage({ image, blog, contentType }: UploadBlogImageInput): Promise<string> {
    try {
      const bucket = this.supabase.storage.from(this.options.imagesBucket);
      const { error } = await bucket.upload(blog.id, image, {
        contentType: contentType || 'image/jpeg',
      });

      if (error) {
        throw error;
      }

      const { data } = bucket.getPublicUrl(blog.id);
      return data.publicUrl;
    } catch (error) {
      throw toServerException('Error uploading blog image', error);
    }
  }

  async uploadBlog(blog: Blog): Promise<Blog> {
    try {
      const { data, error } = await this.supabase
        .from(this.options.blogTable)
        .insert(mapBlogToRow(blog))
        .select()
        .single();

      if (error) {
        throw error;
      }

      const stored = mapRowToBlog(data);
      if (!stored) {
        throw new ServerException('Stored blog row is malformed');
      }
      return stored;
    } catch (error) {
      throw toServerException('Error creating blog', error);
    }
  }

  async getAllBlogs(): Promise<Blog[]> {
    try {
      const { data, error } = await this.supabase
        .from(this.options.blogTable)
        .select(`*, ${this.options.profileTable}(name)`)
        .order('updated_at', { ascending: false });

      if (error) {
        throw error;
      }

      const rows: unknown[] = Array.isArray(data) ? data : [];
      const blogs: Blog[] = [];
      for (const row of rows) {
        const blog = mapRowToBlog(row, this.options.profileTable);
        if (blog) {
          blogs.push(blog);
        } else {
          console.warn('Skipping malformed blog row:', readRowId(row));
        }
      }
      return blogs;
    } catch (error) {
      throw toServerException('Error fetching blogs', error);
    }
  }
}
