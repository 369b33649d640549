import { FileCompression } from './fileCompression.js';
import type Game from './game.js';
import { GameSegmenter } from './gameSegmenter.js';
import type { KillTallyView } from './killTally.js';

export interface ParsedLog {
    readonly games: readonly Game[];
    readonly killsByMeans: KillTallyView;
    readonly killers: KillTallyView;
}

export class Parser {
    constructor(private filename: string) {
    }

    public async parse(): Promise<ParsedLog> {
        const text = await FileCompression.getDecompressedContents(this.filename);
        return Parser.parseText(text);
    }

    public static parseText(text: string): ParsedLog {
        // a fresh segmenter per log; nothing is shared between parses
        const segmenter = new GameSegmenter();
        segmenter.parseLines(Parser.splitLines(text));

        return {
            games: segmenter.games,
            killsByMeans: segmenter.killsByMeans,
            killers: segmenter.killers,
        };
    }

    private static splitLines(text: string): string[] {
        return text.split(/\r?\n/);
    }
}

export default Parser;
