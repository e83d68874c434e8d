import { describe, it, expect } from 'vitest';
import { ConfirmationGate } from './ConfirmationGate.js';
import { ScriptedPrompter, captureLogger } from '../test/fakes.js';

describe('ConfirmationGate', () => {
  it('skips the prompt when bypassed', async () => {
    const prompter = new ScriptedPrompter(['n']);
    const gate = new ConfirmationGate(prompter, captureLogger().logger);

    await expect(gate.confirm('Proceed?', true)).resolves.toBe(true);
    expect(prompter.questions).toEqual([]);
  });

  it.each(['s', 'S'])('accepts %j', async (answer) => {
    const prompter = new ScriptedPrompter([answer]);
    const gate = new ConfirmationGate(prompter, captureLogger().logger);

    await expect(gate.confirm('Proceed?', false)).resolves.toBe(true);
    expect(prompter.questions).toEqual(['Proceed? (s/n): ']);
  });

  it.each(['n', '', 'si', 'yes', 'y'])('declines %j with a warning', async (answer) => {
    const { logger, stdout } = captureLogger();
    const gate = new ConfirmationGate(new ScriptedPrompter([answer]), logger);

    await expect(gate.confirm('Proceed?', false)).resolves.toBe(false);
    expect(stdout.lines).toEqual(['[WARN] Operation cancelled by user.']);
  });
});
