import ActionType from './eventType.js';
import type { Action, ActionOf, KillAction } from './constants.js';
import ParserUtils from './parserUtils.js';

const KILL_DESCRIPTION_RE = /^(.+?)\s+killed\s+(.+?)\s+by\s+(.+)$/s;

export class Event<A extends Action = Action> {
    public readonly timestamp: string;
    public readonly action: A;

    constructor(timestamp: string, action: A) {
        this.timestamp = timestamp;
        this.action = action;
        Object.freeze(action);
        Object.freeze(this);
    }

    public is<T extends ActionType>(type: T): this is Event<ActionOf<T>> {
        return this.action.type === type;
    }

    /** Tokenizes and decodes a raw log line; returns undefined for anything that isn't a recognized event. */
    public static createEvent(line: string): Event | undefined {
        const tokens = ParserUtils.tokenizeLine(line);
        if (!tokens)
            return undefined;

        const action = Event.decodeAction(tokens.content);
        if (!action)
            return undefined;

        return new Event(tokens.timestamp, action);
    }

    // Prefix dispatch; order matters (first match wins).
    public static decodeAction(content: string): Action | undefined {
        if (content.startsWith('InitGame:')) {
            return { type: ActionType.InitGame, details: content.slice('InitGame:'.length).trim() };
        }

        if (content === 'ShutdownGame:') {
            return { type: ActionType.ShutdownGame };
        }

        if (content.startsWith('ClientConnect:')) {
            const playerId = ParserUtils.parseUnsignedInt(content.slice('ClientConnect:'.length).trim());
            return playerId === undefined ? undefined : { type: ActionType.ClientConnect, playerId };
        }

        if (content.startsWith('ClientUserinfoChanged:')) {
            const parts = Event.splitIdAndText(content.slice('ClientUserinfoChanged:'.length));
            if (parts) {
                const playerId = ParserUtils.parseUnsignedInt(parts[0]);
                return playerId === undefined ? undefined : { type: ActionType.ClientUserinfoChanged, playerId, info: parts[1] };
            }
        }

        if (content.startsWith('ClientBegin:')) {
            const playerId = ParserUtils.parseUnsignedInt(content.slice('ClientBegin:'.length).trim());
            return playerId === undefined ? undefined : { type: ActionType.ClientBegin, playerId };
        }

        if (content.startsWith('ClientDisconnect:')) {
            const playerId = ParserUtils.parseUnsignedInt(content.slice('ClientDisconnect:'.length).trim());
            return playerId === undefined ? undefined : { type: ActionType.ClientDisconnect, playerId };
        }

        if (content.startsWith('Item:')) {
            const parts = Event.splitIdAndText(content.slice('Item:'.length));
            if (parts) {
                const itemId = ParserUtils.parseUnsignedInt(parts[0]);
                return itemId === undefined ? undefined : { type: ActionType.Item, itemId, description: parts[1] };
            }
        }

        if (content.startsWith('Kill:')) {
            return Event.decodeKill(content.slice('Kill:'.length).trim());
        }

        // unrecognized keyword, or an id-and-text payload without text: keep it as long as it looks like "Name: details"
        const other = ParserUtils.splitOnFirst(content, ':');
        if (other) {
            return { type: ActionType.Other, actionName: other[0], details: other[1].trim() };
        }

        return undefined;
    }

    // Example: "2 3 7: Isgalamido killed Mocinha by MOD_ROCKET_SPLASH"
    //           ^ kill id, attacker id, victim id
    public static decodeKill(details: string): KillAction | undefined {
        const parts = ParserUtils.splitOnFirst(details, ':');
        if (!parts)
            return undefined;

        const ids = parts[0].trim().split(/\s+/);
        if (ids.length !== 3)
            return undefined;

        const [killId, playerId, victimId] = ids.map(id => ParserUtils.parseUnsignedInt(id));
        if (killId === undefined || playerId === undefined || victimId === undefined)
            return undefined;

        const description = parts[1].trim().match(KILL_DESCRIPTION_RE);
        if (!description)
            return undefined;

        return {
            type: ActionType.Kill,
            killId,
            playerId,
            victimId,
            playerName: description[1],
            victimName: description[2],
            method: description[3],
        };
    }

    // "<id> <verbatim text>", split on the first space after trimming
    private static splitIdAndText(payload: string): [string, string] | undefined {
        return ParserUtils.splitOnFirst(payload.trim(), ' ');
    }
}

export default Event;
