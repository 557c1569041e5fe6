import { Router, Request, Response } from 'express';

export const WELCOME_MESSAGE = 'Welcome to the Admission Announcements API';

/**
 * Root and health probes. Static payloads, no dependencies.
 */
export function createSystemRoutes(): Router {
    const router = Router();

    router.get('/', (req: Request, res: Response) => {
        res.json({ message: WELCOME_MESSAGE });
    });

    router.get('/health', (req: Request, res: Response) => {
        res.json({ status: 'ok' });
    });

    return router;
}
