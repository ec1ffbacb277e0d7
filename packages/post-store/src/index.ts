/**
 * @folio/post-store
 *
 * Post lifecycle (list, get, save, delete, publish) over a remote file
 * gateway, behind a rate limiter and a bounded retry.
 */

export { PostStoreError } from "./errors.ts";
export {
  createPostStore,
  type PostInput,
  type PostStore,
  type PostStoreConfig,
  type SavePostOptions,
} from "./post-store.ts";
export {
  backoffDelay,
  callWithRetry,
  DEFAULT_RETRY_POLICY,
  type RetryContext,
  type RetryPolicy,
} from "./retry.ts";
