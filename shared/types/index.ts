export interface ProbeSource {
    name: string;
    url: string;
}

export interface PushTarget {
    /** scp destination, e.g. user@server.example.com */
    host: string;
    remotePath: string;
    sshKey?: string;
    strictHostKeyChecking: boolean;
}

export type PushResult = { ok: true } | { ok: false; error: string };

export type CycleOutcome =
    | 'probe-failed'
    | 'unchanged'
    | 'pushed'
    | 'push-failed'
    | 'cache-failed'
    | 'interrupted';

export interface AgentConfig {
    server: string;
    remotePath: string;
    /** seconds between poll cycles */
    interval: number;
    cacheFile: string;
    sshKey?: string;
    strictHostKeyChecking: boolean;
    once: boolean;
}

export interface ServerConfig {
    port: number;
    bind: string;
    ipFile: string;
}
