import * as path from 'path';

// Log levels
type LogLevelType = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SILENT';

export const LogLevel = {
    DEBUG: 0,
    INFO: 1,
    WARN: 2,
    ERROR: 3,
    SILENT: 4
} as const;

// ANSI color codes
const colors = {
    reset: '\x1b[0m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m'
} as const;

const STACK_LOCATION = /\(?([^()\s]+):\d+:\d+\)?$/;

function isLogLevelName(value: string): value is LogLevelType {
    return value in LogLevel;
}

export class Logger {
    private level: number;
    private useColors: boolean;
    private workspaceRoot: string;
    private readonly parent: Logger | null;
    private readonly context: string | null;

    constructor(context: string | null = null, parent: Logger | null = null) {
        // Get log level from environment variable, default to INFO
        const envLevel = process.env.LOG_LEVEL?.toUpperCase();
        this.level = envLevel && isLogLevelName(envLevel) ? LogLevel[envLevel] : LogLevel.INFO;

        // Option to disable colors (useful for file output or CI)
        this.useColors = process.env.LOG_NO_COLOR !== 'true';

        this.workspaceRoot = process.cwd();
        this.parent = parent;
        this.context = context;
    }

    /**
     * Set the current log level programmatically
     */
    setLevel(level: string): void {
        const upperLevel = level.toUpperCase();
        if (!isLogLevelName(upperLevel)) return;
        if (this.parent) {
            this.parent.setLevel(upperLevel);
            return;
        }
        this.level = LogLevel[upperLevel];
    }

    /**
     * Get the current log level as a string
     */
    getLevel(): string {
        const current = this.effectiveLevel();
        return Object.keys(LogLevel).find(key => isLogLevelName(key) && LogLevel[key] === current) || 'INFO';
    }

    private effectiveLevel(): number {
        return this.parent ? this.parent.effectiveLevel() : this.level;
    }

    /**
     * Get the calling file name from the stack trace
     */
    _getCallerFile(): string {
        if (this.context) return this.context;

        const stack = new Error().stack;
        if (!stack) return 'unknown';

        // First line is the error message itself
        for (const line of stack.split('\n').slice(1)) {
            const match = STACK_LOCATION.exec(line.trim());
            if (!match) continue;
            const fileName = match[1];
            if (fileName.includes('logger.js') || fileName.includes('logger.ts')) continue;

            const relativePath = path.relative(this.workspaceRoot, fileName);
            if (relativePath.startsWith('..')) {
                return path.basename(fileName);
            }
            return relativePath;
        }
        return 'unknown';
    }

    /**
     * Format the timestamp
     */
    _getTimestamp(): string {
        const now = new Date();
        const hours = String(now.getHours()).padStart(2, '0');
        const minutes = String(now.getMinutes()).padStart(2, '0');
        const seconds = String(now.getSeconds()).padStart(2, '0');
        const ms = String(now.getMilliseconds()).padStart(3, '0');
        return `${hours}:${minutes}:${seconds}.${ms}`;
    }

    _colorize(text: string, color: string): string {
        if (!this.useColors) return text;
        return `${color}${text}${colors.reset}`;
    }

    /**
     * Core logging method
     */
    _log(level: number, levelName: string, color: string, args: unknown[]): void {
        if (this.effectiveLevel() > level) return;

        const timeTag = this._colorize(`[${this._getTimestamp()}]`, colors.gray);
        const levelTag = this._colorize(`[${levelName}]`, color);
        const fileTag = this._colorize(`[${this._getCallerFile()}]`, colors.cyan);

        console.log(`${timeTag} ${levelTag} ${fileTag}`, ...args);
    }

    debug(...args: unknown[]): void {
        this._log(LogLevel.DEBUG, 'DEBUG', colors.gray, args);
    }

    info(...args: unknown[]): void {
        this._log(LogLevel.INFO, 'INFO ', colors.green, args);
    }

    warn(...args: unknown[]): void {
        this._log(LogLevel.WARN, 'WARN ', colors.yellow, args);
    }

    error(...args: unknown[]): void {
        this._log(LogLevel.ERROR, 'ERROR', colors.red, args);
    }

    /**
     * Always log regardless of log level (except SILENT)
     */
    always(...args: unknown[]): void {
        if (this.effectiveLevel() === LogLevel.SILENT) return;

        const timeTag = this._colorize(`[${this._getTimestamp()}]`, colors.gray);
        const fileTag = this._colorize(`[${this._getCallerFile()}]`, colors.cyan);

        console.log(`${timeTag} ${fileTag}`, ...args);
    }

    /**
     * Create a child logger with a specific context/prefix.
     * The child shares its parent's level.
     */
    child(context: string): Logger {
        return new Logger(context, this);
    }
}

const logger = new Logger();

export default logger;
