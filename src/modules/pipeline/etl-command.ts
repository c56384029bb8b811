import { ConfigurationError } from '../utils/etl-errors';

export type EtlStep = 'extract' | 'load';
export type EtlCommand = EtlStep | 'run' | 'schedule';

export const ETL_STEPS: readonly EtlStep[] = ['extract', 'load'];
const ETL_COMMANDS: readonly EtlCommand[] = [...ETL_STEPS, 'run', 'schedule'];

export function parseCommand(argument: string | undefined): EtlCommand {
  if (argument === undefined) {
    return 'run';
  }
  const command = ETL_COMMANDS.find((candidate) => candidate === argument);
  if (!command) {
    throw new ConfigurationError(
      `Unknown command '${argument}', expected one of ${ETL_COMMANDS.join(', ')}`,
    );
  }
  return command;
}

/** Steps a one-shot command runs, in order. */
export function stepsFor(command: Exclude<EtlCommand, 'schedule'>): EtlStep[] {
  return command === 'run' ? [...ETL_STEPS] : [command];
}
