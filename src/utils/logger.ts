import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';

// Define log format
const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(({ timestamp, level, message, stack }) => {
        return stack
            ? `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`
            : `${timestamp} [${level.toUpperCase()}]: ${message}`;
    })
);

const levels = Object.keys(winston.config.npm.levels);

const transports: winston.transport[] = [
    // Console output goes to stderr so JSON on stdout can be piped
    new winston.transports.Console({
        stderrLevels: levels,
        format: winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.printf(({ timestamp, level, message }) => {
                return `${timestamp} ${level}: ${message}`;
            })
        ),
    }),
];

// File output only when a log directory is configured; analysis itself writes nothing
const logsDir = process.env.LOG_DIR;
if (logsDir) {
    transports.push(
        new DailyRotateFile({
            dirname: logsDir,
            filename: 'repolens-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            maxSize: '20m',
            maxFiles: '14d',
            format: logFormat,
        }),
        new winston.transports.File({
            filename: path.join(logsDir, 'error.log'),
            level: 'error',
            format: logFormat,
        })
    );
}

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.LOG_LEVEL === 'silent',
    format: logFormat,
    transports,
});

export default logger;
