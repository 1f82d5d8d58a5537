import { Bloc } from '../lib/bloc';
import { Blog } from '../types/domain';
import { NO_PARAMS } from '../usecases/useCase';
import type { GetAllBlogs } from '../usecases/getAllBlogs';
import type { UploadBlog, UploadBlogParams } from '../usecases/uploadBlog';

export type BlogEvent =
  | ({ type: 'upload' } & UploadBlogParams)
  | { type: 'fetchAll' };

export type BlogState =
  | { status: 'initial' }
  | { status: 'loading' }
  | { status: 'failure'; message: string }
  | { status: 'uploadSuccess'; blog: Blog }
  | { status: 'displaySuccess'; blogs: Blog[] };

type BlogBlocDeps = {
  uploadBlog: Pick<UploadBlog, 'call'>;
  getAllBlogs: Pick<GetAllBlogs, 'call'>;
};

/**
 * Every event emits `loading` once, then exactly one terminal state.
 */
export class BlogBloc extends Bloc<BlogEvent, BlogState> {
  private readonly uploadBlog: BlogBlocDeps['uploadBlog'];
  private readonly getAllBlogs: BlogBlocDeps['getAllBlogs'];

  constructor({ uploadBlog, getAllBlogs }: BlogBlocDeps) {
    super({ status: 'initial' });
    this.uploadBlog = uploadBlog;
    this.getAllBlogs = getAllBlogs;
  }

  protected async onEvent(event: BlogEvent): Promise<void> {
    switch (event.type) {
      case 'upload':
        return this.onUpload(event);
      case 'fetchAll':
        return this.onFetchAll();
      default: {
        const unhandled: never = event;
        throw new Error(`Unhandled blog event: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async onUpload({ type: _type, ...params }: Extract<BlogEvent, { type: 'upload' }>) {
    this.emit({ status: 'loading' });
    const res = await this.uploadBlog.call(params);

    if (!res.ok) {
      this.emit({ status: 'failure', message: res.error.message });
      return;
    }
    this.emit({ status: 'uploadSuccess', blog: res.data });
  }

  private async onFetchAll() {
    this.emit({ status: 'loading' });
    const res = await this.getAllBlogs.call(NO_PARAMS);

    if (!res.ok) {
      this.emit({ status: 'failure', message: res.error.message });
      return;
    }
    this.emit({ status: 'displaySuccess', blogs: res.data });
  }
}
