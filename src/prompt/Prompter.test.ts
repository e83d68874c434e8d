import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { ReadlinePrompter } from './Prompter.js';
import { CaptureStream } from '../test/fakes.js';

describe('ReadlinePrompter', () => {
  it('writes the question and returns the trimmed answer', async () => {
    const input = new PassThrough();
    const output = new CaptureStream();
    const prompter = new ReadlinePrompter(input, output);

    const answer = prompter.ask('Select an option (1-5): ');
    input.write('  3 \n');

    await expect(answer).resolves.toBe('3');
    expect(output.text).toContain('Select an option (1-5): ');
    prompter.close();
  });

  it('keeps answers that arrive together for the following questions', async () => {
    const input = new PassThrough();
    const output = new CaptureStream();
    const prompter = new ReadlinePrompter(input, output);

    input.end('4\n140\n');
    const option = await prompter.ask('Select an option (1-5): ');
    const leagueId = await prompter.ask('Enter the league ID (e.g. 140 for La Liga): ');

    expect([option, leagueId]).toEqual(['4', '140']);
    expect(output.text).toContain('Enter the league ID (e.g. 140 for La Liga): ');
    await expect(prompter.ask('More? ')).resolves.toBe('');
  });

  it('answers empty at end of input', async () => {
    const input = new PassThrough();
    const prompter = new ReadlinePrompter(input, new CaptureStream());

    const answer = prompter.ask('League ID: ');
    input.end();

    await expect(answer).resolves.toBe('');
    await expect(prompter.ask('Again: ')).resolves.toBe('');
  });

  it('answers empty once closed', async () => {
    const prompter = new ReadlinePrompter(new PassThrough(), new CaptureStream());
    prompter.close();

    await expect(prompter.ask('Proceed? (s/n): ')).resolves.toBe('');
  });
});
