export const DEFAULT_PORT = 8080;
export const DEFAULT_BIND = '0.0.0.0';
export const DEFAULT_IP_FILE = '/var/www/html/myip.txt';

export const HEALTH_TOKEN = 'OK';
