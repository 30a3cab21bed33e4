/**
 * Map git's stderr to a fetch failure reason.
 */
import type { FetchFailureReason } from '../../utils/errors.js';

const RULES: Array<{ reason: FetchFailureReason; patterns: RegExp[] }> = [
  {
    reason: 'destination_not_empty',
    patterns: [/already exists and is not an empty directory/i],
  },
  {
    reason: 'auth_required',
    patterns: [
      /authentication failed/i,
      /could not read username/i,
      /could not read password/i,
      /terminal prompts disabled/i,
      /permission denied \(publickey/i,
      /invalid username or password/i,
      /HTTP Basic: Access denied/i,
      /returned error: (401|403)\b/i,
    ],
  },
  {
    reason: 'remote_not_found',
    patterns: [
      /repository .* not found/i,
      /repository not found/i,
      /does not exist/i,
      /does not appear to be a git repository/i,
      /returned error: 404\b/i,
    ],
  },
  {
    reason: 'network_unreachable',
    patterns: [
      /could not resolve host/i,
      /could not resolve hostname/i,
      /unable to access/i,
      /failed to connect/i,
      /connection (refused|timed out|reset)/i,
      /network is unreachable/i,
      /operation timed out/i,
      /early eof/i,
    ],
  },
];

/**
 * Classify a failed clone or pull from git's error output.
 * Rules are checked in order; the first match wins.
 */
export function classifyGitFailure(stderr: string): FetchFailureReason {
  for (const rule of RULES) {
    if (rule.patterns.some((pattern) => pattern.test(stderr))) {
      return rule.reason;
    }
  }
  return 'unknown';
}
