/**
 * Change summarizer tests
 */

import { describe, it, expect } from 'vitest';
import { type FileChange, ModelInvocationError } from '@commitwright/shared';
import { ScriptedModel } from '../../../../tests/helpers/scripted-model.js';
import { fallbackAnalysis, summarizeChanges } from './summarizer.js';

const files: FileChange[] = [
  { path: 'src/app.ts', changeType: 'MODIFIED', addedLines: 2, removedLines: 1, hunks: [], purpose: 'Tweak startup' },
];

describe('summarizeChanges', () => {
  it('should return the model analysis', async () => {
    const model = new ScriptedModel().respond('summary', {
      summary: 'Faster startup',
      changeType: 'perf',
      breakingChange: false,
    });

    const analysis = await summarizeChanges(model, files);

    expect(analysis).toEqual({ summary: 'Faster startup', changeType: 'perf', files, breakingChange: false });
    expect(model.callsOf('summary')[0].prompt).toContain('- src/app.ts: MODIFIED (+2/-1 lines)');
  });

  it('should retry once after an invalid response', async () => {
    const model = new ScriptedModel().respond(
      'summary',
      'not json',
      { summary: 'Faster startup', changeType: 'perf', breakingChange: false }
    );

    const analysis = await summarizeChanges(model, files);

    expect(model.callsOf('summary')).toHaveLength(2);
    expect(analysis.changeType).toBe('perf');
  });

  it('should fall back to chore and salvage the payload', async () => {
    const model = new ScriptedModel().respond('summary', {
      summary: 'Startup tweaks',
      changeType: 'update',
      breakingChange: true,
    });

    const analysis = await summarizeChanges(model, files);

    expect(model.callsOf('summary')).toHaveLength(2);
    expect(analysis).toEqual({ summary: 'Startup tweaks', changeType: 'chore', files, breakingChange: true });
  });

  it('should propagate transport failures without retrying', async () => {
    const model = new ScriptedModel().respond('summary', new ModelInvocationError('connection reset'));

    await expect(summarizeChanges(model, files)).rejects.toBeInstanceOf(ModelInvocationError);
    expect(model.callsOf('summary')).toHaveLength(1);
  });
});

describe('fallbackAnalysis', () => {
  it('should describe the file count when nothing can be salvaged', () => {
    expect(fallbackAnalysis(files, 'garbage')).toEqual({
      summary: 'Changes across 1 file',
      changeType: 'chore',
      files,
      breakingChange: false,
    });
  });
});
