/**
 * Changelog emitter tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { DiffAnalysis } from '@commitwright/shared';
import { appendChangelogSection, formatChangelogSection } from './emitter.js';

const analysis: DiffAnalysis = {
  summary: 'Replace the v1 routes',
  changeType: 'feat',
  breakingChange: true,
  files: [
    { path: 'api/routes.ts', changeType: 'MODIFIED', addedLines: 4, removedLines: 9, hunks: [], purpose: 'New routes' },
    { path: 'api/v1.ts', changeType: 'DELETED', addedLines: 0, removedLines: 30, hunks: [], purpose: 'Remove api/v1.ts' },
  ],
};

describe('formatChangelogSection', () => {
  it('should render header, body, summary, files, type and breaking notice', () => {
    const section = formatChangelogSection('feat(api)!: replace v1 routes\n\nClients must move to v2.', analysis);

    expect(section).toBe(
      [
        '## feat(api)!: replace v1 routes',
        '',
        'Clients must move to v2.',
        '',
        '### Summary',
        'Replace the v1 routes',
        '',
        '### Changed Files',
        '- **api/routes.ts**: New routes',
        '- **api/v1.ts**: Remove api/v1.ts',
        '',
        '### Type: `feat`',
        '',
        '### BREAKING CHANGES',
        'This commit contains breaking changes.',
        '',
      ].join('\n')
    );
  });

  it('should omit the breaking notice for ordinary changes', () => {
    const section = formatChangelogSection('fix: handle empty input', { ...analysis, breakingChange: false });

    expect(section.endsWith('### Type: `feat`\n')).toBe(true);
    expect(section.startsWith('## fix: handle empty input\n\n### Summary\n')).toBe(true);
  });
});

describe('appendChangelogSection', () => {
  let tempDir: string;
  let file: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'commitwright-changelog-test-'));
    file = path.join(tempDir, 'docs', 'CHANGELOG_AGENT.md');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should create the file and its directory', async () => {
    await appendChangelogSection(file, '## first\n');

    expect(await fs.readFile(file, 'utf-8')).toBe('## first\n');
  });

  it('should separate consecutive sections by one blank line', async () => {
    await appendChangelogSection(file, '## first\n');
    await appendChangelogSection(file, '## second\n');

    expect(await fs.readFile(file, 'utf-8')).toBe('## first\n\n## second\n');
  });

  it('should not add a blank line after one already present', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '# Log\n\n');

    await appendChangelogSection(file, '## entry\n');

    expect(await fs.readFile(file, 'utf-8')).toBe('# Log\n\n## entry\n');
  });

  it('should add a full separator when the file lacks a final newline', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '# Log');

    await appendChangelogSection(file, '## entry\n');

    expect(await fs.readFile(file, 'utf-8')).toBe('# Log\n\n## entry\n');
  });
});
