import { describe, it, expect } from 'vitest';
import { decideTransfer } from './decideTransfer';

describe('decideTransfer', () => {
  it('fetches an absent file', () => {
    expect(decideTransfer(null, 100)).toEqual({ action: 'fetch' });
  });

  it('resumes a shorter local file from its size', () => {
    expect(decideTransfer(40, 100)).toEqual({ action: 'resume', from: 40, remoteSize: 100 });
  });

  it('resumes an empty local file from zero', () => {
    expect(decideTransfer(0, 100)).toEqual({ action: 'resume', from: 0, remoteSize: 100 });
  });

  it('skips a complete file', () => {
    expect(decideTransfer(100, 100)).toEqual({ action: 'skip', size: 100 });
  });

  it('flags a local file bigger than the remote one', () => {
    expect(decideTransfer(120, 100)).toEqual({ action: 'mismatch', localSize: 120, remoteSize: 100 });
  });
});
