import ActionType from './eventType.js';
import { assertNever, ParsingError, WORLD_PLAYER_NAME } from './constants.js';
import type { KillAction } from './constants.js';
import Event from './event.js';
import KillTally from './killTally.js';
import type { KillTallyView } from './killTally.js';
import ParserUtils from './parserUtils.js';

class Game {
    private gameId: number;
    private gameEvents: Event[];
    private details: string | undefined;
    private isCompleted: boolean;
    private isSealed: boolean;
    private _killsByMeans: KillTally;
    private _killers: KillTally;

    constructor(id: number) {
        this.gameId = id;
        this.gameEvents = [];
        this.details = undefined;
        this.isCompleted = false;
        this.isSealed = false;
        this._killsByMeans = new KillTally();
        this._killers = new KillTally();
    }

    /** Appends an event and applies its aggregate side effects. */
    public addEvent(event: Event): void {
        if (this.isSealed) {
            throw new ParsingError({
                name: 'LOGIC_FAILURE',
                message: `game ${this.gameId} is finalized; cannot add event at ${event.timestamp}`,
            });
        }

        const action = event.action;
        switch (action.type) {
            case ActionType.InitGame:
                this.details = action.details;
                break;
            case ActionType.ShutdownGame:
                this.isCompleted = true;
                break;
            case ActionType.Kill:
                this._killsByMeans.increment(action.method);
                // environmental kills count toward the cause but not toward any player
                if (action.playerName !== WORLD_PLAYER_NAME) {
                    this._killers.increment(action.playerName);
                }
                break;
            case ActionType.ClientConnect:
            case ActionType.ClientUserinfoChanged:
            case ActionType.ClientBegin:
            case ActionType.Item:
            case ActionType.ClientDisconnect:
            case ActionType.Other:
                break;
            default:
                assertNever(action);
        }

        this.gameEvents.push(event);
    }

    // Called by the segmenter once the game is pushed to the output; no further events are accepted.
    public seal(): void {
        this.isSealed = true;
    }

    public get id(): number {
        return this.gameId;
    }

    public get events(): readonly Event[] {
        return this.gameEvents;
    }

    public get initDetails(): string | undefined {
        return this.details;
    }

    public get completed(): boolean {
        return this.isCompleted;
    }

    public get sealed(): boolean {
        return this.isSealed;
    }

    public get killsByMeans(): KillTallyView {
        return this._killsByMeans.asReadonly();
    }

    public get killers(): KillTallyView {
        return this._killers.asReadonly();
    }

    // player id -> most recently announced name
    public get players(): Map<number, string> {
        const players = new Map<number, string>();
        for (const event of this.gameEvents) {
            if (event.is(ActionType.ClientUserinfoChanged)) {
                const name = ParserUtils.extractPlayerName(event.action.info);
                if (name !== undefined) {
                    players.set(event.action.playerId, name);
                }
            }
        }
        return players;
    }

    public get kills(): Event<KillAction>[] {
        return this.gameEvents.filter((event): event is Event<KillAction> => event.is(ActionType.Kill));
    }
}

export default Game;
