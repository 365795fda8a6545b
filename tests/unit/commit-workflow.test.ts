/**
 * Commit Workflow Tests
 * End-to-end runs over a scripted model
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { CommitWorkflow, type DiffSource } from '@commitwright/core';
import { ModelInvocationError, NoStagedChangesError, type WorkflowStep } from '@commitwright/shared';
import { ScriptedModel, createAgreeableModel } from '../helpers/scripted-model.js';

const NEW_FILE_DIFF = [
  'diff --git a/src/greet.ts b/src/greet.ts',
  'new file mode 100644',
  'index 0000000..3b18e51',
  '--- /dev/null',
  '+++ b/src/greet.ts',
  '@@ -0,0 +1,3 @@',
  '+export function greet(name: string): string {',
  '+  return `hello ${name}`;',
  '+}',
  '',
].join('\n');

const MODE_ONLY_DIFF = [
  'diff --git a/scripts/run.sh b/scripts/run.sh',
  'old mode 100644',
  'new mode 100755',
  '',
].join('\n');

function staticDiff(diff: string): DiffSource {
  return { getStagedDiff: async () => diff };
}

describe('CommitWorkflow', () => {
  let tempDir: string;
  let changelogPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'commitwright-workflow-test-'));
    changelogPath = path.join(tempDir, 'CHANGELOG_AGENT.md');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('accepted on the first check', () => {
    it('should produce a conventional message for a new file', async () => {
      const model = createAgreeableModel();
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff(NEW_FILE_DIFF), changelogPath });

      const result = await workflow.run();

      expect(result.message).toBe('feat(src): add greeting helper');
      expect(result.message.split('\n')[0].length).toBeLessThanOrEqual(50);
      expect(result.analysis.files).toHaveLength(1);
      expect(result.analysis.files[0].changeType).toBe('NEW');
      expect(result.analysis.files[0].addedLines).toBe(3);
      expect(result.analysis.files[0].purpose).toBe('Adds the greeting helper');
      expect(result.state.attempts).toBe(0);
      expect(result.state.finalMessage).toBe(result.message);
      expect(model.callsOf('improve')).toHaveLength(0);
    });

    it('should record one final ledger entry', async () => {
      const workflow = new CommitWorkflow({ model: createAgreeableModel(), diffSource: staticDiff(NEW_FILE_DIFF) });

      const { state } = await workflow.run();

      expect(state.messageHistory).toEqual([
        {
          attempt: 0,
          message: 'feat(src): add greeting helper',
          verdict: { isValid: true, issues: [] },
          status: 'final',
          reason: 'valid',
        },
      ]);
    });

    it('should visit the steps in order and report each transition', async () => {
      const seen: WorkflowStep[] = [];
      const workflow = new CommitWorkflow({
        model: createAgreeableModel(),
        diffSource: staticDiff(NEW_FILE_DIFF),
        onTransition: step => seen.push(step),
      });

      const { state } = await workflow.run();

      const expected: WorkflowStep[] = [
        'parse-diff',
        'analyze-files',
        'summarize',
        'generate-message',
        'check-quality',
        'emit-changelog',
        'terminal',
      ];
      expect(seen).toEqual(expected);
      expect(state.events.map(event => event.step)).toEqual(expected);
    });

    it('should handle a mode-only change', async () => {
      const model = createAgreeableModel({
        type: 'chore',
        scope: 'scripts',
        description: 'make run script executable',
      });
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff(MODE_ONLY_DIFF) });

      const result = await workflow.run();

      expect(result.analysis.files[0]).toMatchObject({
        path: 'scripts/run.sh',
        changeType: 'MODE_CHANGED',
        oldMode: '100644',
        newMode: '100755',
        addedLines: 0,
        removedLines: 0,
      });
      expect(result.message).toBe('chore(scripts): make run script executable');
    });

    it('should mark the header when the analysis reports a breaking change', async () => {
      const model = createAgreeableModel({ breaking: false })
        .respond('summary', { summary: 'Rename the greeting export', changeType: 'feat', breakingChange: true });
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff(NEW_FILE_DIFF) });

      const result = await workflow.run();

      expect(result.message).toBe('feat(src)!: add greeting helper');
      expect(result.commit.breaking).toBe(true);
      expect(result.changelogEntry).toContain('### BREAKING CHANGES\nThis commit contains breaking changes.\n');
    });
  });

  describe('changelog', () => {
    it('should write the formatted section to a new file', async () => {
      const workflow = new CommitWorkflow({
        model: createAgreeableModel(),
        diffSource: staticDiff(NEW_FILE_DIFF),
        changelogPath,
      });

      const result = await workflow.run();

      expect(result.changelogWritten).toBe(true);
      expect(await fs.readFile(changelogPath, 'utf-8')).toBe(
        [
          '## feat(src): add greeting helper',
          '',
          '### Summary',
          'Add a greeting helper',
          '',
          '### Changed Files',
          '- **src/greet.ts**: Adds the greeting helper',
          '',
          '### Type: `feat`',
          '',
        ].join('\n')
      );
    });

    it('should append after the existing bytes without rewriting them', async () => {
      const prior = '# Changelog\n\nprevious entry\n';
      await fs.writeFile(changelogPath, prior);
      const workflow = new CommitWorkflow({
        model: createAgreeableModel(),
        diffSource: staticDiff(NEW_FILE_DIFF),
        changelogPath,
      });

      const result = await workflow.run();
      const content = await fs.readFile(changelogPath, 'utf-8');

      expect(content.startsWith(prior)).toBe(true);
      expect(content).toBe(prior + '\n' + result.changelogEntry);
    });

    it('should leave the file alone when writing is disabled', async () => {
      const workflow = new CommitWorkflow({
        model: createAgreeableModel(),
        diffSource: staticDiff(NEW_FILE_DIFF),
        changelogPath,
        writeChangelog: false,
      });

      const result = await workflow.run();

      expect(result.changelogWritten).toBe(false);
      expect(result.changelogEntry.startsWith('## feat(src): add greeting helper\n')).toBe(true);
      await expect(fs.access(changelogPath)).rejects.toThrow();
    });
  });

  describe('no staged changes', () => {
    it('should stop before any model call', async () => {
      const prior = '# Changelog\n';
      await fs.writeFile(changelogPath, prior);
      const model = createAgreeableModel();
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff(''), changelogPath });

      await expect(workflow.run()).rejects.toBeInstanceOf(NoStagedChangesError);

      expect(model.calls).toHaveLength(0);
      expect(await fs.readFile(changelogPath, 'utf-8')).toBe(prior);
    });

    it('should treat whitespace-only output as empty', async () => {
      const model = createAgreeableModel();
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff('\n  \n') });

      await expect(workflow.run()).rejects.toBeInstanceOf(NoStagedChangesError);
      expect(model.calls).toHaveLength(0);
    });
  });

  describe('improvement loop', () => {
    it('should accept an improved message once it passes', async () => {
      const model = createAgreeableModel({ description: 'Added stuff.' })
        .respond('quality', { isValid: false, issues: ['description is vague'] }, { isValid: true, issues: [] });
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff(NEW_FILE_DIFF) });

      const result = await workflow.run();

      expect(result.message).toBe('feat(src): add greeting helper');
      expect(result.state.attempts).toBe(1);
      expect(result.state.messageHistory.map(entry => entry.status)).toEqual(['failed', 'improved', 'final']);
      expect(result.state.messageHistory[0].message).toBe('feat(src): added stuff');
      expect(result.state.messageHistory[2].reason).toBe('valid');
    });

    it('should force-accept after five improvements', async () => {
      const model = createAgreeableModel()
        .respond('quality', { isValid: false, issues: ['description is vague'] })
        .respond('improve', { type: 'feat', scope: 'src', description: 'add greet function' });
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff(NEW_FILE_DIFF) });

      const result = await workflow.run();

      expect(model.callsOf('quality')).toHaveLength(6);
      expect(model.callsOf('improve')).toHaveLength(5);
      expect(result.state.attempts).toBe(5);
      expect(result.state.messageHistory).toHaveLength(11);

      const last = result.state.messageHistory[10];
      expect(last.status).toBe('final');
      expect(last.reason).toBe('max-attempts-reached');
      expect(last.attempt).toBe(5);
      expect(result.message).toBe('feat(src): add greet function');
    });

    it('should honor a smaller attempt budget', async () => {
      const model = createAgreeableModel().respond('quality', { isValid: false, issues: ['too terse'] });
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff(NEW_FILE_DIFF), maxAttempts: 0 });

      const result = await workflow.run();

      expect(model.callsOf('improve')).toHaveLength(0);
      expect(result.state.attempts).toBe(0);
      expect(result.state.messageHistory).toHaveLength(1);
      expect(result.state.messageHistory[0].reason).toBe('max-attempts-reached');
    });

    it('should clamp an attempt budget above five', async () => {
      const model = createAgreeableModel().respond('quality', { isValid: false, issues: ['too terse'] });
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff(NEW_FILE_DIFF), maxAttempts: 9 });

      const result = await workflow.run();

      expect(model.callsOf('quality')).toHaveLength(6);
      expect(result.state.attempts).toBe(5);
    });

    it('should stay within five improvements when the budget is not a number', async () => {
      const model = createAgreeableModel().respond('quality', { isValid: false, issues: ['too terse'] });
      let checks = 0;
      const workflow = new CommitWorkflow({
        model,
        diffSource: staticDiff(NEW_FILE_DIFF),
        maxAttempts: Number.NaN,
        onTransition: step => {
          if (step === 'check-quality' && ++checks > 6) {
            throw new Error(`quality checked ${checks} times`);
          }
        },
      });

      const result = await workflow.run();

      expect(checks).toBe(6);
      expect(result.state.attempts).toBe(5);
      expect(result.state.messageHistory[10].reason).toBe('max-attempts-reached');
    });

    it('should keep the previous message when a rewrite is unusable', async () => {
      const model = createAgreeableModel()
        .respond('quality', { isValid: false, issues: ['too terse'] })
        .respond('improve', 'not json at all');
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff(NEW_FILE_DIFF), maxAttempts: 1 });

      const result = await workflow.run();

      expect(result.message).toBe('feat(src): add greeting helper');
      expect(result.state.attempts).toBe(1);
      expect(result.state.messageHistory.map(entry => entry.status)).toEqual(['failed', 'improved', 'final']);
      expect(result.state.messageHistory[1].message).toBe('feat(src): add greeting helper');
    });
  });

  describe('model failures', () => {
    it('should fall back to a template purpose on a malformed file response', async () => {
      const model = createAgreeableModel().respond('file-purpose', '{"purpose": ""}');
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff(NEW_FILE_DIFF) });

      const result = await workflow.run();

      expect(result.analysis.files[0].purpose).toBe('Add src/greet.ts');
    });

    it('should propagate transport failures', async () => {
      const model = createAgreeableModel().respond('file-purpose', new ModelInvocationError('connection refused'));
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff(NEW_FILE_DIFF), changelogPath });

      await expect(workflow.run()).rejects.toBeInstanceOf(ModelInvocationError);
      await expect(fs.access(changelogPath)).rejects.toThrow();
    });

    it('should not call the model for binary files', async () => {
      const model: ScriptedModel = createAgreeableModel();
      const diff = [
        'diff --git a/assets/logo.png b/assets/logo.png',
        'index 1234567..89abcde 100644',
        'Binary files a/assets/logo.png and b/assets/logo.png differ',
      ].join('\n');
      const workflow = new CommitWorkflow({ model, diffSource: staticDiff(diff) });

      const result = await workflow.run();

      expect(model.callsOf('file-purpose')).toHaveLength(0);
      expect(result.analysis.files[0].purpose).toBe('Update binary file assets/logo.png');
    });
  });
});
