import { Octokit } from '@octokit/rest';
import { GitHubCiProvider, GitHubRestClient } from '../../src/infrastructure/ci/GitHubCiProvider';
import { CiUnavailableError } from '../../src/domain/common/Errors';
import { mockLogger } from '../helpers';

class RequestError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
  }
}

function fakeClient() {
  const listForRef = jest.fn<ReturnType<GitHubRestClient['rest']['checks']['listForRef']>, []>();
  const getCombinedStatusForRef = jest.fn<ReturnType<GitHubRestClient['rest']['repos']['getCombinedStatusForRef']>, []>();
  const getCommit = jest.fn<ReturnType<GitHubRestClient['rest']['repos']['getCommit']>, []>();
  const compareCommitsWithBasehead = jest.fn<ReturnType<GitHubRestClient['rest']['repos']['compareCommitsWithBasehead']>, []>();
  const client: GitHubRestClient = {
    rest: {
      checks: { listForRef },
      repos: { getCombinedStatusForRef, getCommit, compareCommitsWithBasehead },
    },
  };
  return { client, listForRef, getCombinedStatusForRef, getCommit, compareCommitsWithBasehead };
}

describe('GitHubCiProvider', () => {
  it('should report every check as unavailable without a token', async () => {
    const provider = GitHubCiProvider.create(undefined, 'acme/widgets', mockLogger());

    await expect(provider.checkResults('abc1234', ['test'])).rejects.toThrow(CiUnavailableError);
    await expect(provider.isOnMainline('abc1234', 'main')).rejects.toThrow('GitHub token is not configured');
  });

  it('should accept the Octokit REST client', () => {
    const client: GitHubRestClient = new Octokit({ auth: 'test-token' });

    expect(new GitHubCiProvider(client, 'acme/widgets', mockLogger())).toBeInstanceOf(GitHubCiProvider);
  });

  it('should require an owner/repo pair', async () => {
    const { client } = fakeClient();
    const provider = new GitHubCiProvider(client, undefined, mockLogger());

    await expect(provider.commitTimestamp('abc1234')).rejects.toThrow('GitHub repository is not configured');
  });

  describe('with a client', () => {
    let fake: ReturnType<typeof fakeClient>;
    let provider: GitHubCiProvider;

    beforeEach(() => {
      fake = fakeClient();
      provider = new GitHubCiProvider(fake.client, 'acme/widgets', mockLogger());
    });

    it('should combine check runs and commit statuses', async () => {
      fake.listForRef.mockResolvedValue({
        data: {
          check_runs: [
            { name: 'test', status: 'completed', conclusion: 'success' },
            { name: 'lint', status: 'completed', conclusion: 'neutral' },
            { name: 'build', status: 'in_progress', conclusion: null },
          ],
        },
      });
      fake.getCombinedStatusForRef.mockResolvedValue({
        data: { statuses: [{ context: 'deploy-preview', state: 'pending' }, { context: 'test', state: 'failure' }] },
      });

      const results = await provider.checkResults('abc1234', ['test', 'lint', 'build', 'deploy-preview', 'security']);

      expect(results).toEqual([
        { name: 'test', conclusion: 'success' },
        { name: 'lint', conclusion: 'failure' },
        { name: 'build', conclusion: 'pending' },
        { name: 'deploy-preview', conclusion: 'pending' },
        { name: 'security', conclusion: 'missing' },
      ]);
    });

    it('should treat an unknown commit as missing every check', async () => {
      fake.listForRef.mockRejectedValue(new RequestError('Not Found', 404));
      fake.getCombinedStatusForRef.mockResolvedValue({ data: { statuses: [] } });

      expect(await provider.checkResults('abc1234', ['test'])).toEqual([{ name: 'test', conclusion: 'missing' }]);
    });

    it('should raise other API failures as unavailable', async () => {
      fake.listForRef.mockRejectedValue(new RequestError('Server Error', 502));
      fake.getCombinedStatusForRef.mockResolvedValue({ data: { statuses: [] } });

      await expect(provider.checkResults('abc1234', ['test'])).rejects.toThrow(
        'GitHub API error (502) during check lookup for abc1234'
      );
    });

    it('should read the committer date', async () => {
      fake.getCommit.mockResolvedValue({
        data: { commit: { committer: { date: '2026-03-02T09:00:00Z' }, author: { date: '2026-03-01T09:00:00Z' } } },
      });

      expect(await provider.commitTimestamp('abc1234')).toEqual(new Date('2026-03-02T09:00:00Z'));
    });

    it('should return no timestamp for an unknown commit', async () => {
      fake.getCommit.mockRejectedValue(new RequestError('No commit found', 422));

      expect(await provider.commitTimestamp('abc1234')).toBeNull();
    });

    it('should accept commits the branch already contains', async () => {
      fake.compareCommitsWithBasehead
        .mockResolvedValueOnce({ data: { status: 'behind' } })
        .mockResolvedValueOnce({ data: { status: 'identical' } })
        .mockResolvedValueOnce({ data: { status: 'diverged' } });

      expect(await provider.isOnMainline('abc1234', 'main')).toBe(true);
      expect(await provider.isOnMainline('abc1234', 'main')).toBe(true);
      expect(await provider.isOnMainline('abc1234', 'main')).toBe(false);
      expect(fake.compareCommitsWithBasehead).toHaveBeenCalledWith({ owner: 'acme', repo: 'widgets', basehead: 'main...abc1234' });
    });
  });
});
