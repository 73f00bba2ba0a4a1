import type { Server } from 'http';

/** Port of a server listening on TCP. */
export function listeningPort(server: Server): number {
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Server is not listening on a TCP port');
    }
    return address.port;
}
