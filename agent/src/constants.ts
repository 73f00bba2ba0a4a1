import os from 'os';
import path from 'path';
import type { ProbeSource } from '../../shared/types';

export const DEFAULT_REMOTE_PATH = '/var/www/html/myip.txt';
export const DEFAULT_INTERVAL_SECONDS = 300;
export const DEFAULT_CACHE_FILE = path.join(os.homedir(), '.ipbeacon', 'cached_ip.txt');

export const PROBE_REQUEST_TIMEOUT_MS = 5000;
export const PROBE_SOURCE_TIMEOUT_MS = 10000;
export const PUSH_TIMEOUT_MS = 30000;

export const IP_SOURCES: readonly ProbeSource[] = [
    { name: 'ifconfig.me', url: 'https://ifconfig.me/ip' },
    { name: 'ipify', url: 'https://api.ipify.org' },
    { name: 'icanhazip', url: 'https://icanhazip.com' },
    { name: 'amazonaws', url: 'https://checkip.amazonaws.com' },
];
