import { Router } from 'express';
import { HEALTH_TOKEN } from '../../constants';

const router = Router({ strict: true, caseSensitive: true });

// Liveness only: never touches the IP file.
router.get('/health', (req, res, next) => {
    if (req.method !== 'GET') return next();
    res.status(200).type('text/plain').send(HEALTH_TOKEN);
});

export default router;
