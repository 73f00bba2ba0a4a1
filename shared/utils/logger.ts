import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'path';

const MAX_LOG_SIZE = 10 * 1024 * 1024; // 10MB
const REPEAT_FLUSH_MS = 2000;

type Stream = 'stdout' | 'stderr';

export class Logger {
    private lastMessage: string = '';
    private lastLevel: string = '';
    private lastStream: Stream = 'stdout';
    private repeatCount: number = 0;
    private throttleTimeout: NodeJS.Timeout | null = null;
    private readonly logFile: string | null;

    /**
     * @param service Label printed in every line.
     * @param fileName Log file name used when IPBEACON_LOG_DIR is set.
     */
    constructor(private readonly service: string, fileName: string, logDir = process.env.IPBEACON_LOG_DIR) {
        if (logDir) {
            fs.ensureDirSync(logDir);
            this.logFile = path.join(logDir, `${fileName}.log`);
        } else {
            this.logFile = null;
        }
    }

    private getTimestamp() {
        const now = new Date();
        const date = now.toLocaleDateString('en-GB');
        const time = now.toLocaleTimeString('en-GB', { hour12: false });
        return `${date} ${time}`;
    }

    private format(level: string, message: string) {
        return `[+] ${this.service}: ${this.getTimestamp()} - ${level}: ${message}`;
    }

    private writeToFile(line: string) {
        if (!this.logFile) return;
        try {
            if (fs.existsSync(this.logFile)) {
                const stats = fs.statSync(this.logFile);
                if (stats.size > MAX_LOG_SIZE) {
                    const rotated = this.logFile.replace(/\.log$/, `-${Date.now()}.log`);
                    fs.moveSync(this.logFile, rotated);
                }
            }
            fs.appendFileSync(this.logFile, line + '\n');
        } catch (e) {
            console.error('FAILED TO WRITE TO LOG FILE:', e);
        }
    }

    private emit(line: string, stream: Stream) {
        if (stream === 'stderr') console.error(line);
        else console.log(line);
    }

    private flushRepeats() {
        if (this.repeatCount === 0) return;
        const statusMsg = this.format('STABILITY', `(Previous message repeated ${this.repeatCount} times)`);
        this.emit(chalk.gray(statusMsg), this.lastStream);
        this.writeToFile(statusMsg);
        this.repeatCount = 0;
    }

    private logThrottled(level: string, message: string, colorFn: (s: string) => string, stream: Stream) {
        if (level === this.lastLevel && message === this.lastMessage) {
            this.repeatCount++;
            if (this.throttleTimeout) clearTimeout(this.throttleTimeout);

            this.throttleTimeout = setTimeout(() => {
                this.throttleTimeout = null;
                this.flushRepeats();
                this.lastMessage = '';
                this.lastLevel = '';
            }, REPEAT_FLUSH_MS);
            // A pending repeat summary must not hold the process open.
            this.throttleTimeout.unref();
            return;
        }

        if (this.throttleTimeout) {
            clearTimeout(this.throttleTimeout);
            this.throttleTimeout = null;
        }
        this.flushRepeats();

        this.lastMessage = message;
        this.lastLevel = level;
        this.lastStream = stream;
        const formatted = this.format(level, message);
        this.emit(colorFn(formatted), stream);
        this.writeToFile(formatted);
    }

    info(message: string) {
        this.logThrottled('INFO', message, chalk.white, 'stdout');
    }

    success(message: string) {
        this.logThrottled('SUCCESS', message, chalk.green, 'stdout');
    }

    warn(message: string) {
        this.logThrottled('WARNING', message, chalk.yellow, 'stderr');
    }

    error(message: string) {
        this.logThrottled('ERROR', message, chalk.red, 'stderr');
    }

    debug(message: string) {
        if (process.env.NODE_ENV === 'development' || process.env.VERBOSE === 'true') {
            this.logThrottled('DEBUG', message, chalk.gray, 'stdout');
        }
    }

    /** Unformatted line, used for request access logs. */
    raw(message: string) {
        console.log(message);
        this.writeToFile(message);
    }
}
