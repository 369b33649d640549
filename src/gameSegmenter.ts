import ActionType from './eventType.js';
import Event from './event.js';
import Game from './game.js';
import KillTally from './killTally.js';
import type { KillTallyView } from './killTally.js';

// Groups decoded events into games. A game opens on InitGame and closes on ShutdownGame,
// on the next InitGame (server restarted without a shutdown line), or at end of input.
export class GameSegmenter {
    private finalizedGames: Game[] = [];
    private currentGame: Game | undefined;
    private gameCounter = 0;

    private overallKillsByMeans = new KillTally();
    private overallKillers = new KillTally();

    /** Decodes and handles every line in order, then flushes any game left open. */
    public parseLines(lines: Iterable<string>): void {
        for (const line of lines) {
            const event = Event.createEvent(line);
            if (event) {
                this.handleEvent(event);
            }
        }
        this.finish();
    }

    public handleEvent(event: Event): void {
        switch (event.action.type) {
            case ActionType.InitGame: {
                this.finalizeCurrentGame();

                const game = new Game(++this.gameCounter);
                game.addEvent(event);
                this.currentGame = game;
                break;
            }
            case ActionType.ShutdownGame:
                if (this.currentGame) {
                    this.currentGame.addEvent(event);
                    this.finalizeCurrentGame();
                }
                break;
            default:
                // events outside of a game belong to no session
                this.currentGame?.addEvent(event);
                break;
        }
    }

    public finish(): void {
        this.finalizeCurrentGame();
    }

    private finalizeCurrentGame(): void {
        const game = this.currentGame;
        if (!game)
            return;

        this.currentGame = undefined;
        game.seal();
        this.overallKillsByMeans.merge(game.killsByMeans);
        this.overallKillers.merge(game.killers);
        this.finalizedGames.push(game);
    }

    public get games(): readonly Game[] {
        return this.finalizedGames;
    }

    public get openGame(): Game | undefined {
        return this.currentGame;
    }

    public get killsByMeans(): KillTallyView {
        return this.overallKillsByMeans.asReadonly();
    }

    public get killers(): KillTallyView {
        return this.overallKillers.asReadonly();
    }
}

export default GameSegmenter;
