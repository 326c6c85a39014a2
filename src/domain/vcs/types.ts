import type { ResolvedRef } from '../version/resolver.js';

/**
 * Version-control operations the lifecycle engine relies on. Implementations throw VcsError
 * for every failed step.
 */
export interface VcsClient {
  clone(remote: string, destination: string): Promise<void>;
  /** Fetch exactly one tag or commit from origin into an existing working copy. */
  fetchRef(path: string, target: ResolvedRef): Promise<void>;
  checkout(path: string, target: ResolvedRef): Promise<void>;
  listRemoteTags(remote: string): Promise<string[]>;
  /** Head commit of the remote's default branch, or null when the remote advertises none. */
  remoteHead(remote: string): Promise<string | null>;
  headCommit(path: string): Promise<string>;
  /** Diagnostic only, e.g. "1.2M". */
  directorySize(path: string): Promise<string>;
  /** Diagnostic only, e.g. "3 weeks ago". */
  commitAge(path: string, ref: ResolvedRef): Promise<string>;
}
