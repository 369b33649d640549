import cors from 'cors';
import express from 'express';
import multer from 'multer';

import { ParsingError } from './constants.js';
import type { ParseResponse } from './constants.js';
import type { FraglogConfig } from './config.js';
import { Parser } from './parser.js';
import Report from './report.js';

class App {
    public express: express.Express;
    private upload: multer.Multer;

    constructor(config: Pick<FraglogConfig, 'uploadLimitBytes'>) {
        this.express = express();

        // logs are parsed straight from memory; nothing is written to disk
        this.upload = multer({
            storage: multer.memoryStorage(),
            limits: {
                fileSize: config.uploadLimitBytes,
            },
        });

        this.mountRoutes();
    }

    private mountRoutes(): void {
        const router = express.Router();
        router.get('/', (req, res) => {
            res.json({
                message: 'fraglog is running',
            });
        });

        router.post('/parseLog', cors(), this.upload.single('log'), (req, res) => {
            const parserResponse = this.parseUpload(req.file);
            if (parserResponse.success) {
                res.status(200).json({ success: parserResponse.stats });
            }
            else {
                const { error_reason, message } = parserResponse;
                res.status(400).json({ failure: { error_reason, message } });
            }
        });

        this.express.use('/', router);

        // multer limit errors and anything thrown by a route land here
        this.express.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
            if (res.headersSent) {
                return next(err);
            }

            if (err instanceof multer.MulterError) {
                res.status(400).json({ failure: { error_reason: 'PARSING_FAILURE', message: err.message } });
                return;
            }

            const error_reason = err instanceof ParsingError ? err.name : 'LOGIC_FAILURE';
            const message = err instanceof Error ? err.message : String(err);
            console.error(`[app] ${req.method} ${req.path} failed: ${message}`);
            res.status(500).json({ failure: { error_reason, message } });
        });
    }

    private parseUpload(file: Express.Multer.File | undefined): ParseResponse {
        if (!file) {
            return {
                success: false,
                error_reason: 'PARSING_FAILURE',
                message: 'expected one log file in `log`',
            };
        }

        const parsed = Parser.parseText(file.buffer.toString('utf8'));
        console.log(`[app] parsed upload ${file.originalname}: ${parsed.games.length} games`);
        return {
            success: true,
            stats: Report.toJson(parsed),
        };
    }
}

export default App;
