import { Octokit } from '@octokit/rest';
import { CiCheckResult, ICiProvider } from '../../domain/services/ICiProvider';
import { CiUnavailableError } from '../../domain/common/Errors';
import { ILogger } from '../../domain/common/ILogger';

// Kept a type alias so it satisfies the index signature on Octokit's request parameters
type RepoParams = { owner: string; repo: string };

/**
 * The slice of the Octokit REST client this provider calls.
 */
export interface GitHubRestClient {
  rest: {
    checks: {
      listForRef(params: RepoParams & { ref: string; per_page?: number }): Promise<{
        data: { check_runs: Array<{ name: string; status: string; conclusion: string | null }> };
      }>;
    };
    repos: {
      getCombinedStatusForRef(params: RepoParams & { ref: string }): Promise<{
        data: { statuses: Array<{ context: string; state: string }> };
      }>;
      getCommit(params: RepoParams & { ref: string }): Promise<{
        data: { commit: { committer: { date?: string } | null; author: { date?: string } | null } };
      }>;
      compareCommitsWithBasehead(params: RepoParams & { basehead: string }): Promise<{
        data: { status: string };
      }>;
    };
  };
}

/**
 * Type guard: checks if an error is an Octokit RequestError (duck-typing).
 */
export function isOctokitRequestError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}

function conclusionOfCheckRun(run: { status: string; conclusion: string | null }): CiCheckResult['conclusion'] {
  if (run.status !== 'completed') return 'pending';
  return run.conclusion === 'success' ? 'success' : 'failure';
}

function conclusionOfStatus(state: string): CiCheckResult['conclusion'] {
  if (state === 'success') return 'success';
  if (state === 'pending') return 'pending';
  return 'failure';
}

/**
 * CI collaborator backed by GitHub check runs and commit statuses.
 */
export class GitHubCiProvider implements ICiProvider {
  constructor(
    private client: GitHubRestClient | null,
    private repository: string | undefined,
    private logger: ILogger
  ) {}

  /**
   * Build a provider from credentials. Without a token or repository every query
   * reports the CI as unavailable.
   */
  static create(token: string | undefined, repository: string | undefined, logger: ILogger): GitHubCiProvider {
    const client = token ? new Octokit({ auth: token, userAgent: 'prp-coordinator' }) : null;
    return new GitHubCiProvider(client, repository, logger);
  }

  private target(): { client: GitHubRestClient; owner: string; repo: string } {
    if (!this.client) {
      throw new CiUnavailableError('GitHub token is not configured');
    }
    const [owner, repo] = (this.repository ?? '').split('/');
    if (!owner || !repo) {
      throw new CiUnavailableError('GitHub repository is not configured');
    }
    return { client: this.client, owner, repo };
  }

  private unavailable(error: unknown, context: string): CiUnavailableError {
    if (isOctokitRequestError(error)) {
      this.logger.warn(`GitHub API error during ${context}`, { status: error.status, error: error.message });
      return new CiUnavailableError(`GitHub API error (${error.status}) during ${context}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    this.logger.warn(`GitHub unreachable during ${context}`, { error: message });
    return new CiUnavailableError(`GitHub unreachable during ${context}: ${message}`);
  }

  async checkResults(commitSha: string, requiredChecks: string[]): Promise<CiCheckResult[]> {
    const { client, owner, repo } = this.target();

    let runs: Array<{ name: string; status: string; conclusion: string | null }>;
    let statuses: Array<{ context: string; state: string }>;
    try {
      const [runResponse, statusResponse] = await Promise.all([
        client.rest.checks.listForRef({ owner, repo, ref: commitSha, per_page: 100 }),
        client.rest.repos.getCombinedStatusForRef({ owner, repo, ref: commitSha }),
      ]);
      runs = runResponse.data.check_runs;
      statuses = statusResponse.data.statuses;
    } catch (error) {
      if (isOctokitRequestError(error) && error.status === 404) {
        return requiredChecks.map(name => ({ name, conclusion: 'missing' }));
      }
      throw this.unavailable(error, `check lookup for ${commitSha}`);
    }

    return requiredChecks.map((name): CiCheckResult => {
      // Newest first: the first run with a matching name is authoritative.
      const run = runs.find(r => r.name === name);
      if (run) return { name, conclusion: conclusionOfCheckRun(run) };

      const status = statuses.find(s => s.context === name);
      if (status) return { name, conclusion: conclusionOfStatus(status.state) };

      return { name, conclusion: 'missing' };
    });
  }

  async commitTimestamp(commitSha: string): Promise<Date | null> {
    const { client, owner, repo } = this.target();

    try {
      const { data } = await client.rest.repos.getCommit({ owner, repo, ref: commitSha });
      const date = data.commit.committer?.date ?? data.commit.author?.date;
      return date ? new Date(date) : null;
    } catch (error) {
      if (isOctokitRequestError(error) && (error.status === 404 || error.status === 422)) {
        return null;
      }
      throw this.unavailable(error, `commit lookup for ${commitSha}`);
    }
  }

  async isOnMainline(commitSha: string, branch: string): Promise<boolean> {
    const { client, owner, repo } = this.target();

    try {
      const { data } = await client.rest.repos.compareCommitsWithBasehead({
        owner,
        repo,
        basehead: `${branch}...${commitSha}`,
      });
      // The commit is an ancestor of (or equal to) the branch head.
      return data.status === 'identical' || data.status === 'behind';
    } catch (error) {
      if (isOctokitRequestError(error) && error.status === 404) {
        return false;
      }
      throw this.unavailable(error, `mainline comparison for ${commitSha}`);
    }
  }
}
