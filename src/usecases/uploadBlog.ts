import type { Blog, Result } from '../types/domain';
import type { BlogRepository, UploadBlogInput } from '../services/blogRepository';
import type { UseCase } from './useCase';

export type UploadBlogParams = UploadBlogInput;

export class UploadBlog implements UseCase<Blog, UploadBlogParams> {
  constructor(private readonly blogRepository: BlogRepository) {}

  call(params: UploadBlogParams): Promise<Result<Blog>> {
    return this.blogRepository.uploadBlog(params);
  }
}
