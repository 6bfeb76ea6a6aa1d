import { describe, it, expect } from '@jest/globals';
import { eventFromEnvironment, shouldTrigger, type TriggerFilter } from '../../../src/lib/trigger';

const FILTER: TriggerFilter = { events: ['push', 'pull_request'], branches: ['main', 'release/*'], paths: [] };

describe('trigger filter', () => {
  it('should accept listed events on matching branches', () => {
    expect(shouldTrigger({ name: 'push', branch: 'main' }, FILTER)).toBe(true);
    expect(shouldTrigger({ name: 'pull_request', branch: 'release/1.2' }, FILTER)).toBe(true);
  });

  it('should reject other events and branches', () => {
    expect(shouldTrigger({ name: 'workflow_dispatch', branch: 'main' }, FILTER)).toBe(false);
    expect(shouldTrigger({ name: 'push', branch: 'feature/x' }, FILTER)).toBe(false);
    expect(shouldTrigger({ name: 'push', branch: 'main-old' }, FILTER)).toBe(false);
  });

  describe('path filter', () => {
    const filter: TriggerFilter = { ...FILTER, paths: ['./src/', 'Dockerfile'] };

    it('should match changed files by prefix', () => {
      expect(shouldTrigger({ name: 'push', branch: 'main', changedFiles: ['src/app.py'] }, filter)).toBe(true);
      expect(shouldTrigger({ name: 'push', branch: 'main', changedFiles: ['Dockerfile'] }, filter)).toBe(true);
    });

    it('should skip when no changed file matches', () => {
      expect(shouldTrigger({ name: 'push', branch: 'main', changedFiles: ['README.md'] }, filter)).toBe(false);
    });

    it('should run when the changed files are unknown', () => {
      expect(shouldTrigger({ name: 'push', branch: 'main' }, filter)).toBe(true);
    });
  });

  describe('eventFromEnvironment', () => {
    it('should use the ref name for pushes', () => {
      expect(eventFromEnvironment({ GITHUB_EVENT_NAME: 'push', GITHUB_REF_NAME: 'main' })).toEqual({
        name: 'push',
        branch: 'main',
      });
    });

    it('should use the base branch for pull requests', () => {
      expect(
        eventFromEnvironment({ GITHUB_EVENT_NAME: 'pull_request', GITHUB_REF_NAME: '12/merge', GITHUB_BASE_REF: 'main' }),
      ).toEqual({ name: 'pull_request', branch: 'main' });
    });

    it('should return undefined outside CI or for unknown events', () => {
      expect(eventFromEnvironment({})).toBeUndefined();
      expect(eventFromEnvironment({ GITHUB_EVENT_NAME: 'schedule', GITHUB_REF_NAME: 'main' })).toBeUndefined();
    });
  });
});
