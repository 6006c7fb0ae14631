import { describe, it, expect } from '@jest/globals';
import { exitCodeFor, formatFailure } from '@/cli/guidance';

describe('formatFailure', () => {
  it('prints the cause, the fix and the steps for the code', () => {
    const lines = formatFailure({
      error: 'Authentication failed for ops@10.0.0.11',
      code: 'AUTHENTICATION',
      guidance: { hint: 'All credentials were rejected', resolution: 'Check the ssh section' },
    });

    expect(lines).toEqual([
      'Error [AUTHENTICATION]: Authentication failed for ops@10.0.0.11',
      '  Cause: All credentials were rejected',
      '  Fix: Check the ssh section',
      '  Troubleshooting:',
      '    1. Try the credential by hand: ssh -i <keyFile> <user>@<address>',
      '    2. Non-root users need passwordless sudo or a password in the cluster file',
    ]);
  });

  it('prints only the message for an uncoded failure', () => {
    expect(formatFailure({ error: 'boom' })).toEqual(['Error: boom']);
  });
});

describe('exitCodeFor', () => {
  it('separates cancellation from failure', () => {
    expect(exitCodeFor('USER_CANCELLED')).toBe(2);
    expect(exitCodeFor('PHASE')).toBe(1);
    expect(exitCodeFor(undefined)).toBe(1);
  });
});
