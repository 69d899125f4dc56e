/**
 * Unit Tests: Report formatting
 */

import { describe, it, expect } from 'vitest';

import {
  formatCollections,
  formatExecutionReport,
  formatPlanDetails,
  formatPlanSummary,
  formatRunSummary,
} from '../../src/utils/report.js';
import { computePlan } from '../../src/reconcilers/documents/diff.js';
import type { ExecutionReport } from '../../src/reconcilers/documents/types.js';
import type { RunSummary } from '../../src/pipeline/types.js';
import { makeDoc, makeItem } from '../helpers.js';

const plan = computePlan(
  [makeItem('D', { collectionPaths: [['X', 'Z']] }), makeItem('N', { collectionPaths: [['AI']] })],
  [makeDoc('D', ['X', 'Y']), makeDoc('G', ['Gone'])]
);

describe('formatPlanSummary', () => {
  it('lists the action counts and status', () => {
    const lines = formatPlanSummary(plan).split('\n');

    expect(lines[0]).toBe('Reconciliation Plan');
    expect(lines[4]).toBe(`Plan ID: ${plan.planId}`);
    expect(lines.slice(6)).toEqual([
      'Actions:',
      '  + Add: 1',
      '  ~ Move: 1',
      '  - Archive: 1',
      '  = In sync: 0',
      '',
      'Status: CHANGES NEEDED',
    ]);
  });

  it('reports an empty plan as in sync', () => {
    const empty = computePlan([], []);
    expect(formatPlanSummary(empty).endsWith('  = In sync: 0\n\nStatus: IN SYNC')).toBe(true);
  });
});

describe('formatPlanDetails', () => {
  it('lists every change', () => {
    expect(formatPlanDetails(plan)).toBe(
      [
        'New items:',
        '  + N Paper N -> AI',
        '',
        'Moves:',
        '  ~ D: X/Y -> X/Z',
        '',
        'Archive (removed from library):',
        '  - G: Gone/Paper G_G.md',
      ].join('\n')
    );
  });
});

describe('formatExecutionReport', () => {
  it('includes the backup and errors', () => {
    const report: ExecutionReport = {
      planId: 'plan-1',
      runDate: '20240305',
      dryRun: false,
      backupPath: '/backups/notes_backup.tar.gz',
      results: [],
      added: [],
      removedFolders: ['X/Y'],
      summary: { moved: 1, archived: 0, unchanged: 2, failed: 1, added: 0, foldersRemoved: 1 },
      errors: ['move D: destination already exists: X/Z/Paper D_D.md'],
      success: false,
    };

    expect(formatExecutionReport(report)).toBe(
      [
        'Reconciliation Applied',
        '',
        'Backup: /backups/notes_backup.tar.gz',
        '  ~ Moved: 1',
        '  - Archived: 0',
        '  = Already done: 2',
        '  + New items for processing: 0',
        '  - Empty folders removed: 1',
        '',
        'Errors:',
        '  X move D: destination already exists: X/Z/Paper D_D.md',
      ].join('\n')
    );
  });
});

describe('formatRunSummary', () => {
  it('lists failures and the interruption', () => {
    const summary: RunSummary = {
      runId: 'run-1',
      startedAt: '2024-03-05T12:00:00.000Z',
      finishedAt: '2024-03-05T12:05:00.000Z',
      candidates: 5,
      skipped: 1,
      queued: 4,
      succeeded: ['A'],
      failed: [{ key: 'B', stage: 'Summarizing', reason: 'retries-exhausted' }],
      remaining: ['C', 'D'],
      interrupted: true,
      resumed: true,
      success: false,
    };

    expect(formatRunSummary(summary)).toBe(
      [
        'Run run-1 (resumed)',
        '',
        '  Candidates: 5 (1 already done)',
        '  + Succeeded: 1',
        '  X Failed: 1',
        '  ! Not started: 2',
        '',
        'Failures:',
        '  X B at Summarizing: retries-exhausted',
        '',
        'Status: INTERRUPTED (continue with --resume)',
      ].join('\n')
    );
  });
});

describe('formatCollections', () => {
  it('prints one path per line', () => {
    expect(
      formatCollections([
        { key: 'C1', name: 'ML', path: ['AI', 'ML'], itemCount: 3 },
        { key: 'C2', name: 'Bio', path: ['Bio'] },
      ])
    ).toBe('AI/ML (3)\nBio');
  });

  it('says so when there are none', () => {
    expect(formatCollections([])).toBe('No collections');
  });
});
