import * as fs from 'fs';

// Structured logging utility
type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
    level: LogLevel;
    message: string;
    timestamp: string;
    context?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

function thresholdFromEnv(): number {
    const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
    return isLogLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

export function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < thresholdFromEnv()) return;

    const entry: LogEntry = {
        level,
        message,
        timestamp: new Date().toISOString(),
        context
    };

    const line = JSON.stringify(entry);
    if (level === 'error' || level === 'warn') {
        console.error(line);
    } else {
        console.log(line);
    }

    // Mirror to a plain-text file when LOG_FILE is set (used by scheduled runs)
    const logFile = process.env.LOG_FILE;
    if (logFile) {
        const logMessage = `${entry.timestamp} [${level.toUpperCase()}] ${message}${context ? ' ' + JSON.stringify(context) : ''}\n`;
        try {
            fs.appendFileSync(logFile, logMessage);
        } catch (err) {
            console.error(JSON.stringify({
                level: 'error',
                message: 'Failed to write log file',
                timestamp: entry.timestamp,
                context: { logFile, error: err instanceof Error ? err.message : String(err) }
            }));
        }
    }
}
