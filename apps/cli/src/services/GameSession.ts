import type Logger from "bunyan";
import type { GameSettings, GameSnapshot, MoveResult } from "@dropfour/core";
import { GameEngine } from "@dropfour/engine";

/**
 * One terminal game: wraps a GameEngine for the UI shell and logs every
 * lifecycle event. Replays reuse the same engine.
 */
export class GameSession {
  private engine: GameEngine;
  private gamesPlayed = 1;

  constructor(
    settings: GameSettings,
    private log: Logger
  ) {
    this.engine = new GameEngine(settings);
    log.info({ settings: this.engine.settings() }, "Game started");
  }

  get settings(): GameSettings {
    return this.engine.settings();
  }

  snapshot(): GameSnapshot {
    return this.engine.snapshot();
  }

  drop(column: number): MoveResult {
    const player = this.engine.currentPlayer();
    const result = this.engine.applyMove(column);

    switch (result.kind) {
      case "rejected":
        this.log.warn({ player, column, reason: result.reason }, "Move rejected");
        break;
      case "continue":
        this.log.debug({ player, column, row: result.row }, "Checker dropped");
        break;
      case "win":
        this.log.info(
          { player, column, row: result.row, line: result.line, turns: this.engine.turnNumber() },
          "Game won"
        );
        break;
      case "tie":
        this.log.info({ column, row: result.row, turns: this.engine.turnNumber() }, "Game tied");
        break;
    }

    return result;
  }

  playAgain(): void {
    this.engine.reset();
    this.gamesPlayed++;
    this.log.info({ game: this.gamesPlayed }, "Board reset for another game");
  }
}
