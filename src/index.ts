#!/usr/bin/env node
import App from './App.js';
import { loadConfig } from './config.js';
import { ParsingError } from './constants.js';
import { Parser } from './parser.js';
import Report from './report.js';

// either start the upload server or parse a log
// node dist/index.js server
// node dist/index.js <logFile[.br]>

const programArgs = process.argv.slice(2);
if (programArgs.length > 0 && programArgs[0].toLocaleLowerCase() === 'server') {
    const config = loadConfig();
    const app = new App(config).express;

    app.listen(config.port, () => {
        console.log(`server is listening on ${config.port}.`);
    }).on("error", (err) => {
        console.error(`[server] ${err.message}`);
        process.exitCode = 1;
    });
}
else if (programArgs.length === 0) {
    console.error('usage: fraglog <logFile> | fraglog server');
    process.exitCode = 2;
}
else {
    try {
        const parsed = await new Parser(programArgs[0]).parse();
        process.stdout.write(new Report().render(parsed));
    }
    catch (error: unknown) {
        if (error instanceof ParsingError) {
            console.error(`Failed to parse log (${error.name}): ${error.message}`);
        }
        else {
            console.error('Failed to parse log, message follows:');
            console.error(error);
        }
        process.exitCode = 1;
    }
}
