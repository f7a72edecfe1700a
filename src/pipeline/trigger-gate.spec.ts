import { branchFromRef, evaluateTrigger } from './trigger-gate';

describe('branchFromRef', () => {
  it('strips refs/heads/', () => {
    expect(branchFromRef('refs/heads/main')).toBe('main');
    expect(branchFromRef('refs/heads/release/1.x')).toBe('release/1.x');
  });

  it('accepts a bare branch name', () => {
    expect(branchFromRef('main')).toBe('main');
  });

  it('returns null for tags and other refs', () => {
    expect(branchFromRef('refs/tags/v1.0.0')).toBeNull();
    expect(branchFromRef('refs/pull/7/merge')).toBeNull();
    expect(branchFromRef('refs/heads/')).toBeNull();
  });
});

describe('evaluateTrigger', () => {
  const branches = ['main'];

  it('runs a push to main with its commit', () => {
    expect(evaluateTrigger({ ref: 'refs/heads/main', commit: 'abc123' }, branches)).toEqual({
      run: true,
      branch: 'main',
      commit: 'abc123',
    });
  });

  it('ignores pushes to other branches', () => {
    expect(evaluateTrigger({ ref: 'refs/heads/feature/x', commit: 'abc123' }, branches)).toEqual({
      run: false,
      reason: 'branch feature/x is not one of: main',
    });
  });

  it('ignores tag pushes', () => {
    expect(evaluateTrigger({ ref: 'refs/tags/v1', commit: 'abc123' }, branches)).toEqual({
      run: false,
      reason: 'refs/tags/v1 is not a branch push',
    });
  });

  it('ignores events without a ref', () => {
    expect(evaluateTrigger({ ref: null, commit: null }, branches)).toEqual({
      run: false,
      reason: '(no ref) is not a branch push',
    });
  });

  it('ignores branch deletions', () => {
    const deleted = { run: false, reason: 'branch main was deleted' };
    expect(evaluateTrigger({ ref: 'refs/heads/main', commit: null, deleted: true }, branches)).toEqual(deleted);
    expect(
      evaluateTrigger({ ref: 'refs/heads/main', commit: '0000000000000000000000000000000000000000' }, branches),
    ).toEqual(deleted);
  });

  it('matches branch names exactly', () => {
    expect(evaluateTrigger({ ref: 'refs/heads/main2', commit: null }, branches).run).toBe(false);
    expect(evaluateTrigger({ ref: 'refs/heads/release', commit: null }, ['main', 'release'])).toEqual({
      run: true,
      branch: 'release',
      commit: null,
    });
  });
});
