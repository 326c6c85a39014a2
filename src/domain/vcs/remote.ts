import { isAbsolute } from 'node:path';

const VCS_SUFFIX = /\.git$/;

function looksLikeUrl(source: string): boolean {
  return source.includes('://') || source.startsWith('git@');
}

/**
 * Clone URL for a source identifier. Full URLs and absolute paths pass through; `owner/repo` is
 * appended to the base URL.
 */
export function resolveRemoteUrl(sourceRepo: string, baseUrl: string): string {
  if (looksLikeUrl(sourceRepo) || isAbsolute(sourceRepo)) return sourceRepo;
  return `${baseUrl.replace(/\/+$/, '')}/${sourceRepo.replace(/^\/+/, '')}`;
}

/** Last path segment of a source, without a trailing `.git`. `owner/repo.git` gives `repo`. */
export function deriveName(sourceRepo: string): string {
  const trimmed = sourceRepo.trim().replace(/[/\\]+$/, '');
  const segment = trimmed.split(/[/\\:]/).pop() ?? '';
  return segment.replace(VCS_SUFFIX, '');
}
