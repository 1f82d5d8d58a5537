export { NO_PARAMS } from './useCase';
export type { NoParams, UseCase } from './useCase';
export { UploadBlog } from './uploadBlog';
export type { UploadBlogParams } from './uploadBlog';
export { GetAllBlogs } from './getAllBlogs';
export { UserSignIn } from './userSignIn';
export { UserSignUp } from './userSignUp';
export { CurrentUser } from './currentUser';
export { UserSignOut } from './userSignOut';
