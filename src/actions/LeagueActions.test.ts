import { describe, it, expect, beforeEach } from 'vitest';
import { LeagueActions, buildMainArgs } from './LeagueActions.js';
import { ConfirmationGate } from '../prompt/ConfirmationGate.js';
import { ConfirmationDeclinedError, ValidationError } from '../core/errors.js';
import { CaptureStream, FakeProcessRunner, ScriptedPrompter, captureLogger, testEnvironment } from '../test/fakes.js';
import type { ActionContext } from './types.js';

describe('buildMainArgs', () => {
  it('runs the main module with the filter and optional season', () => {
    expect(buildMainArgs([], null)).toEqual(['-m', 'api_football.main']);
    expect(buildMainArgs(['--limit', '3'], '2022')).toEqual(['-m', 'api_football.main', '--limit', '3', '--season', '2022']);
  });
});

describe('LeagueActions', () => {
  let runner: FakeProcessRunner;
  let prompter: ScriptedPrompter;
  let stdout: CaptureStream;
  let context: ActionContext;

  function actions(answers: string[] = []): LeagueActions {
    prompter = new ScriptedPrompter(answers);
    return new LeagueActions(new ConfirmationGate(prompter, context.logger));
  }

  beforeEach(() => {
    runner = new FakeProcessRunner();
    const captured = captureLogger();
    stdout = captured.stdout;
    context = { environment: testEnvironment(), runner, logger: captured.logger };
  });

  describe('processAll', () => {
    it('runs without prompting when assume-yes is set', async () => {
      const status = await actions().processAll(context, true, null);

      expect(status).toBe(0);
      expect(prompter.questions).toEqual([]);
      expect(runner.calls.map((call) => call.args)).toEqual([['-m', 'api_football.main']]);
    });

    it('runs after an affirmative answer', async () => {
      await actions(['s']).processAll(context, false, null);

      expect(prompter.questions).toEqual(['Are you sure? This can take several hours. (s/n): ']);
      expect(runner.calls).toHaveLength(1);
    });

    it('launches nothing when declined', async () => {
      await expect(actions(['n']).processAll(context, false, null)).rejects.toThrow(ConfirmationDeclinedError);

      expect(runner.calls).toHaveLength(0);
      expect(stdout.lines).toEqual([
        '[INFO] Processing ALL leagues.',
        '[WARN] Operation cancelled by user.'
      ]);
    });
  });

  describe('processLimit', () => {
    it('passes the exact limit', async () => {
      const status = await actions().processLimit(context, '10', null);

      expect(status).toBe(0);
      expect(runner.calls[0].args).toEqual(['-m', 'api_football.main', '--limit', '10']);
      expect(runner.calls[0].options.stdio).toBe('inherit');
      expect(stdout.lines).toEqual(['[INFO] Processing 10 leagues (test mode)...']);
    });

    it('passes a twenty-digit limit exactly', async () => {
      await actions().processLimit(context, '99999999999999999999', null);

      expect(runner.calls[0].args).toEqual(['-m', 'api_football.main', '--limit', '99999999999999999999']);
    });

    it('returns the child status', async () => {
      runner.respondWith(() => ({ exitCode: 4 }));

      await expect(actions().processLimit(context, '2', null)).resolves.toBe(4);
    });

    it.each(['0', 'abc', '-1'])('validates %j before launching', async (limit) => {
      await expect(actions().processLimit(context, limit, null)).rejects.toThrow(ValidationError);
      expect(runner.calls).toHaveLength(0);
    });
  });

  describe('processLeague', () => {
    it('passes the league ID and season', async () => {
      await actions().processLeague(context, '140', '2023');

      expect(runner.calls[0].args).toEqual(['-m', 'api_football.main', '--league-id', '140', '--season', '2023']);
    });

    it('validates the ID before launching', async () => {
      await expect(actions().processLeague(context, 'la-liga', null)).rejects.toThrow('Invalid league ID: la-liga (digits only)');
      expect(runner.calls).toHaveLength(0);
    });
  });
});
