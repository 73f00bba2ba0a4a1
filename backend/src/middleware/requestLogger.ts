import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad = (n: number) => String(n).padStart(2, '0');

/** Access-log timestamp, e.g. 19/Oct/2026 14:03:07 */
export function formatAccessTime(date: Date): string {
    const day = `${pad(date.getDate())}/${MONTHS[date.getMonth()]}/${date.getFullYear()}`;
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
    return `${day} ${time}`;
}

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
    const receivedAt = new Date();
    res.on('finish', () => {
        const client = req.socket.remoteAddress ?? '-';
        const requestLine = `${req.method} ${req.originalUrl} HTTP/${req.httpVersion}`;
        logger.raw(`${client} - - [${formatAccessTime(receivedAt)}] "${requestLine}" ${res.statusCode}`);
    });
    next();
};
