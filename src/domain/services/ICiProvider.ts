/**
 * Outcome of one named CI check for a commit.
 */
export interface CiCheckResult {
  name: string;
  /** `missing` when the provider has no record of the check for this commit. */
  conclusion: 'success' | 'failure' | 'pending' | 'missing';
}

/**
 * Continuous-integration collaborator, queried by commit hash.
 *
 * Implementations throw `CiUnavailableError` when they cannot answer (no credentials,
 * no connectivity); callers treat that as "cannot verify", never as a pass.
 */
export interface ICiProvider {
  checkResults(commitSha: string, requiredChecks: string[]): Promise<CiCheckResult[]>;

  /** Commit time, or null if the provider does not know the commit. */
  commitTimestamp(commitSha: string): Promise<Date | null>;

  isOnMainline(commitSha: string, branch: string): Promise<boolean>;
}
