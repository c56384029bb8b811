import { ConfigurationError } from '../utils/etl-errors';
import { parseCommand, stepsFor } from './etl-command';

describe('parseCommand', () => {
  it('defaults to a full run', () => {
    expect(parseCommand(undefined)).toBe('run');
  });

  it.each(['extract', 'load', 'run', 'schedule'])('accepts %s', (command) => {
    expect(parseCommand(command)).toBe(command);
  });

  it('rejects anything else', () => {
    expect(() => parseCommand('deploy')).toThrow(ConfigurationError);
    expect(() => parseCommand('deploy')).toThrow(
      "Unknown command 'deploy', expected one of extract, load, run, schedule",
    );
  });
});

describe('stepsFor', () => {
  it('runs extract before load', () => {
    expect(stepsFor('run')).toEqual(['extract', 'load']);
  });

  it('runs a single step on its own', () => {
    expect(stepsFor('load')).toEqual(['load']);
  });
});
