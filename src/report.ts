import { readFileSync } from 'fs';

import Handlebars from 'handlebars';

import type { OutputGame, OutputPlayer, OutputStats, TallyEntry } from './constants.js';
import type Game from './game.js';
import type { ParsedLog } from './parser.js';
import TemplateUtils from './templateUtils.js';

export interface GameSummary {
    id: number;
    eventCount: number;
    status: 'completed' | 'incomplete';
    players: OutputPlayer[];
    killCount: number;
    killsByMeans: TallyEntry[];
    killers: TallyEntry[];
}

export interface ReportContext {
    games: GameSummary[];
    killsByMeans: TallyEntry[];
    killers: TallyEntry[];
}

export type ReportTemplate = Handlebars.TemplateDelegate<ReportContext>;

export class Report {
    private template: ReportTemplate;

    // if no pre-compiled template is provided, compile the one shipped next to this module
    constructor(template?: ReportTemplate) {
        if (!template) {
            const templateFile = new URL('./templates/summary.hbs', import.meta.url);
            TemplateUtils.registerHelpers();
            template = Handlebars.compile<ReportContext>(readFileSync(templateFile, 'utf-8'), { noEscape: true });
        }
        this.template = template;
    }

    public render(parsed: ParsedLog): string {
        return this.template(Report.buildContext(parsed));
    }

    public static buildContext(parsed: ParsedLog): ReportContext {
        return {
            games: parsed.games.map((game): GameSummary => ({
                id: game.id,
                eventCount: game.events.length,
                status: game.completed ? 'completed' : 'incomplete',
                players: Report.listPlayers(game),
                killCount: game.kills.length,
                killsByMeans: game.killsByMeans.sorted(),
                killers: game.killers.sorted(),
            })),
            killsByMeans: parsed.killsByMeans.sorted(),
            killers: parsed.killers.sorted(),
        };
    }

    public static toJson(parsed: ParsedLog): OutputStats {
        const games = parsed.games.map((game): OutputGame => ({
            id: game.id,
            completed: game.completed,
            init_details: game.initDetails,
            event_count: game.events.length,
            kill_count: game.kills.length,
            players: Report.listPlayers(game),
            kills_by_means: game.killsByMeans.toJSON(),
            killers: game.killers.toJSON(),
        }));

        return {
            game_count: games.length,
            games,
            kills_by_means: parsed.killsByMeans.toJSON(),
            killers: parsed.killers.toJSON(),
        };
    }

    private static listPlayers(game: Game): OutputPlayer[] {
        return Array.from(game.players, ([id, name]) => ({ id, name }))
            .sort((a, b) => a.id - b.id);
    }
}

export default Report;
