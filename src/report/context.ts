import * as github from '@actions/github';
import type { GitDefaults } from './types';

const REF_PREFIXES = ['refs/heads/', 'refs/tags/'];

function stripRefPrefix(ref: string): string {
  for (const prefix of REF_PREFIXES) {
    if (ref.startsWith(prefix)) return ref.slice(prefix.length);
  }
  return ref;
}

/**
 * Reads branch, commit and repository URL of the running workflow, used when
 * the report-context file leaves them out.
 */
export function getGitDefaults(): GitDefaults {
  const { ref, sha, serverUrl } = github.context;
  const defaults: GitDefaults = {};

  if (ref) defaults.branch = stripRefPrefix(ref);
  if (sha) defaults.git_commit = sha;

  // context.repo throws outside a workflow, so check the variable it reads
  const repository = process.env.GITHUB_REPOSITORY;
  if (repository) {
    const { owner, repo } = github.context.repo;
    defaults.git_url = `${serverUrl}/${owner}/${repo}.git`;
  }

  return defaults;
}
