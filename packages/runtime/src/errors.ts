/**
 * Raised when a world document is malformed or references something that
 * does not exist. Loading aborts; these are authoring errors.
 */
export class WorldLoadError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid world document (${problems.length} problem${problems.length === 1 ? '' : 's'}):\n  - ${problems.join('\n  - ')}`);
    this.name = 'WorldLoadError';
    this.problems = problems;
  }
}

/**
 * Internal lookup failed for something load-time validation should have ruled out.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

/**
 * A scripted walkthrough issued a command that is not valid where it was issued.
 */
export class SimulationError extends Error {
  readonly step: number;
  readonly command: string;

  constructor(step: number, command: string, locationId: number) {
    super(`Invalid command at step ${step + 1} (location ${locationId}): "${command}"`);
    this.name = 'SimulationError';
    this.step = step;
    this.command = command;
  }
}
