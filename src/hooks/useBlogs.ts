import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import type { BlogBloc } from '../blocs/blogBloc';
import type { UploadBlogParams } from '../usecases/uploadBlog';
import { Blog } from '../types/domain';
import { useBlocState } from './useBlocState';

type UseBlogsResult = {
  blogs: Blog[];
  isLoading: boolean;
  error: string | null;
  lastUploaded: Blog | null;
  refetch: () => Promise<void>;
  uploadBlog: (params: UploadBlogParams) => Promise<void>;
};

/**
 * Loads every blog on mount and keeps the last fetched list while an upload
 * or a refetch is in flight.
 */
export const useBlogs = (blogBloc: BlogBloc): UseBlogsResult => {
  const state = useBlocState(blogBloc);
  const [blogs, setBlogs] = useState<Blog[]>([]);
  const [lastUploaded, setLastUploaded] = useState<Blog | null>(null);
  const didFetch = useRef(false);

  useEffect(() => {
    if (state.status === 'displaySuccess') {
      setBlogs(state.blogs);
    } else if (state.status === 'uploadSuccess') {
      setLastUploaded(state.blog);
    }
  }, [state]);

  const refetch = useCallback(() => blogBloc.add({ type: 'fetchAll' }), [blogBloc]);

  const uploadBlog = useCallback(
    (params: UploadBlogParams) => blogBloc.add({ type: 'upload', ...params }),
    [blogBloc]
  );

  useEffect(() => {
    if (didFetch.current) return;
    didFetch.current = true;
    void refetch();
  }, [refetch]);

  return useMemo(
    () => ({
      blogs,
      isLoading: state.status === 'loading',
      error: state.status === 'failure' ? state.message : null,
      lastUploaded,
      refetch,
      uploadBlog,
    }),
    [blogs, state, lastUploaded, refetch, uploadBlog]
  );
};
