import type { GameState } from "./state";

/** Running games keyed by channel. At most one game per channel. */
export class GameRegistry {
  private readonly games = new Map<string, GameState>();

  get(channelId: string): GameState | undefined {
    return this.games.get(channelId);
  }

  /** Registers the game unless the channel already has one running. */
  claim(channelId: string, state: GameState): boolean {
    const existing = this.games.get(channelId);
    if (existing?.inProgress) return false;
    this.games.set(channelId, state);
    return true;
  }

  /** Removes the game only when it is still the one registered. */
  release(channelId: string, state: GameState): void {
    if (this.games.get(channelId) === state) {
      this.games.delete(channelId);
    }
  }

  /** The game in this channel when it has an open round. */
  activeRound(channelId: string): GameState | undefined {
    const state = this.games.get(channelId);
    return state?.inProgress && state.current ? state : undefined;
  }
}
