import { CI_JOB_PREFIXES } from '@flaky-rerun/shared';

export type CiProvider = 'circleci' | 'buildkite' | 'none';

/**
 * Repository and job identity sent with the catalog request
 */
export interface CiContext {
  readonly provider: CiProvider;
  readonly repoName?: string;
  readonly jobName?: string;
}

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Detect the CI provider from its built-in environment variables.
 * Buildkite wins when both providers' variables are present.
 */
export function detectCiContext(env: Environment = process.env): CiContext {
  let context: CiContext = { provider: 'none' };

  // https://circleci.com/docs/variables/#built-in-environment-variables
  if (env.CIRCLE_JOB) {
    context = {
      provider: 'circleci',
      jobName: CI_JOB_PREFIXES.CIRCLECI + env.CIRCLE_JOB,
      repoName: `${env.CIRCLE_PROJECT_USERNAME ?? ''}/${env.CIRCLE_PROJECT_REPONAME ?? ''}`,
    };
  }

  if (env.BUILDKITE_PIPELINE_SLUG) {
    context = {
      provider: 'buildkite',
      jobName: CI_JOB_PREFIXES.BUILDKITE + env.BUILDKITE_PIPELINE_SLUG,
      repoName: repoNameFromRemote(env.BUILDKITE_REPO),
    };
  }

  return context;
}

// BUILDKITE_REPO looks like "git@github.com:{owner}/{repo}.git"
function repoNameFromRemote(remote: string | undefined): string | undefined {
  if (!remote) {
    return undefined;
  }
  return remote.replace('git@github.com:', '').replace('.git', '');
}
