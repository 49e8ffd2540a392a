import type { AdventureEngine, GameEvent, GameState } from '@text-adventure/runtime';

export type LineWriter = (line: string) => void;

export interface RendererOptions {
  /** Defaults to console.log */
  write?: LineWriter;
  /** Print meters after every state change */
  verbose?: boolean;
}

/**
 * Console Renderer
 * Prints engine output and builds the per-turn prompt.
 */
export class ConsoleRenderer {
  private engine: AdventureEngine;
  private write: LineWriter;
  private verbose: boolean;
  private unsubscribe: (() => void) | null = null;

  constructor(engine: AdventureEngine, options: RendererOptions = {}) {
    this.engine = engine;
    this.write = options.write ?? ((line) => console.log(line));
    this.verbose = options.verbose ?? false;
    this.subscribeToEngine();
  }

  private subscribeToEngine(): void {
    this.unsubscribe = this.engine.on((event) => this.handleEvent(event));
  }

  private handleEvent(event: GameEvent): void {
    switch (event.type) {
      case 'message':
        this.write(event.text);
        break;

      case 'game_ended':
        this.write('='.repeat(40));
        this.write(`Game over (${event.outcome}). Final score: ${event.state.score}`);
        this.write('='.repeat(40));
        break;

      case 'state_changed':
        if (this.verbose) {
          this.write(`  [${describeMeters(event.state)}]`);
        }
        break;

      case 'game_started':
      case 'location_changed':
        break;
    }
  }

  /**
   * Location header plus first-visit or brief narration
   */
  renderArrival(): void {
    const location = this.engine.getCurrentLocation();
    this.write('');
    this.write(`Location: ${location.name}`);
    this.write(this.engine.describeLocation());
  }

  renderPrompt(): void {
    this.write(`What to do? Choose from: ${this.engine.getMenu().join(', ')}`);
    this.write('At this location, you can also:');
    for (const command of [...this.engine.getMovementCommands(), ...this.engine.getSpecialCommands()]) {
      this.write(`- ${command}`);
    }
  }

  renderChoice(command: string): void {
    this.write('========');
    this.write(`You decided to: ${command}`);
  }

  destroy(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }
}

export function describeMeters(state: Readonly<GameState>): string {
  const status = [
    `time ${state.movementTimer}`,
    `health ${state.healthBar}`,
    `moves ${state.movesMade}`,
    `score ${state.score}`,
  ];
  if (state.hungry) status.push('hungry');
  if (state.energized) status.push('energized');
  return status.join(', ');
}
