import winston from 'winston';
import fs from 'fs';
import path from 'path';

const validLogLevels = [
    'fatal',
    'error',
    'perf',
    'warn',
    'info',
    'http',
    'verbose',
    'debug',
    'silly',
    'trace',
    'cons'
];

let logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();

if (!validLogLevels.includes(logLevel)) {
    console.warn(`Invalid LOG_LEVEL "${logLevel}" specified. Using "info" instead.`);
    console.warn(`Valid levels are: ${validLogLevels.join(', ')}`);
    logLevel = 'info';
}

// Console format with timestamp first
const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
        return `[${timestamp}] ${level}: ${message} ${metaStr}`;
    })
);

const customLevels = {
    levels: {
        fatal: 0,
        error: 1,
        perf: 2,
        warn: 3,
        info: 4,
        http: 5,
        verbose: 6,
        debug: 7,
        silly: 8,
        trace: 9,
        cons: 10
    },
    colors: {
        fatal: 'redBG white',
        error: 'red',
        perf: 'magenta',
        warn: 'yellow',
        info: 'green',
        http: 'cyan',
        verbose: 'blue',
        debug: 'white',
        silly: 'grey',
        trace: 'grey',
        cons: 'inverse'
    }
};

winston.addColors(customLevels.colors);

const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];

// File output is opt-in so that tests and one-off scripts leave no files behind
const logsDir = process.env.LOG_DIR;
if (logsDir) {
    if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
    }
    const nodeIdentifier = process.env.NODE_NAME || Math.random().toString(36).substring(7);
    transports.push(
        new winston.transports.File({
            filename: path.join(logsDir, `output-${nodeIdentifier}.log`),
            level: logLevel,
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            )
        })
    );
}

const logger = winston.createLogger({
    levels: customLevels.levels,
    level: logLevel,
    format: winston.format.errors({ stack: true }),
    transports
});

export default logger;
