import * as fs from 'fs';
import * as zlib from 'zlib';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { ParsingError } from './constants.js';

export class FileCompression {
    private static compressedFileExtension = ".br"; // brotli

    public static isCompressed(filePath: string): boolean {
        return path.extname(filePath) === FileCompression.compressedFileExtension;
    }

    /** Reads a log as utf8 text, decompressing brotli logs on the way. Read failures are fatal. */
    public static async getDecompressedContents(filePath: string): Promise<string> {
        const pathIsCompressed = FileCompression.isCompressed(filePath);

        const chunks: Buffer[] = [];
        const collect = async (source: AsyncIterable<Buffer>): Promise<void> => {
            for await (const chunk of source) {
                chunks.push(chunk);
            }
        };

        try {
            if (pathIsCompressed) {
                await pipeline(fs.createReadStream(filePath), zlib.createBrotliDecompress(), collect);
            }
            else {
                await pipeline(fs.createReadStream(filePath), collect);
            }
        }
        catch (error: unknown) {
            console.error(`[fileCompression] failed to read ${filePath}`);
            throw new ParsingError({
                name: 'FILE_FAILURE',
                message: `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
            });
        }

        return Buffer.concat(chunks).toString('utf8');
    }
}

export default FileCompression;
