import type { Blog, Result } from '../types/domain';
import type { BlogRepository } from '../services/blogRepository';
import type { NoParams, UseCase } from './useCase';

export class GetAllBlogs implements UseCase<Blog[], NoParams> {
  constructor(private readonly blogRepository: BlogRepository) {}

  call(_params: NoParams): Promise<Result<Blog[]>> {
    return this.blogRepository.getAllBlogs();
  }
}
