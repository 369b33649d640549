import type { ActionType } from './eventType.js';

// Reserved attacker name for environmental kills (falls, lava, trigger_hurt).
export const WORLD_PLAYER_NAME = '<world>';

export type Action =
    | { readonly type: ActionType.InitGame; readonly details: string }
    | { readonly type: ActionType.ShutdownGame }
    | { readonly type: ActionType.ClientConnect; readonly playerId: number }
    | { readonly type: ActionType.ClientUserinfoChanged; readonly playerId: number; readonly info: string }
    | { readonly type: ActionType.ClientBegin; readonly playerId: number }
    | { readonly type: ActionType.Item; readonly itemId: number; readonly description: string }
    | { readonly type: ActionType.Kill; readonly killId: number; readonly playerId: number; readonly victimId: number; readonly playerName: string; readonly victimName: string; readonly method: string }
    | { readonly type: ActionType.ClientDisconnect; readonly playerId: number }
    | { readonly type: ActionType.Other; readonly actionName: string; readonly details: string };

export type ActionOf<T extends ActionType> = Extract<Action, { type: T }>;
export type KillAction = ActionOf<ActionType.Kill>;

export interface TokenizedLine {
    timestamp: string;
    content: string;
}

export interface TallyEntry {
    key: string;
    count: number;
}

export interface OutputPlayer {
    id: number;
    name: string;
}

export interface OutputGame {
    id: number;
    completed: boolean;
    init_details?: string;
    event_count: number;
    kill_count: number;
    players: OutputPlayer[];
    kills_by_means: Record<string, number>;
    killers: Record<string, number>;
}

export interface OutputStats {
    game_count: number;
    games: OutputGame[];
    kills_by_means: Record<string, number>;
    killers: Record<string, number>;
}

export type ParsingErrorName = 'PARSING_FAILURE' | 'LOGIC_FAILURE' | 'FILE_FAILURE';

export type ParseResponse =
    | { success: true; stats: OutputStats }
    | { success: false; error_reason: ParsingErrorName; message: string };

export class ParsingError extends Error {
    public override name: ParsingErrorName;

    constructor({ name, message }: { name: ParsingErrorName, message: string }) {
        super(message);
        this.name = name;
    }
}

export function assertNever(value: never): never {
    throw new ParsingError({
        name: 'LOGIC_FAILURE',
        message: `unexpected value: ${JSON.stringify(value)}`,
    });
}
