import { Router, Request, Response } from 'express';
import { AnnouncementService } from '../../application/AnnouncementService';
import { paginate } from '../../domain/entities/Pagination';
import { asyncHandler, NotFoundError } from '../middleware/errorHandler';
import { parsePagination } from '../middleware/pagination';

/**
 * Creates announcement routes with dependency injection.
 */
export function createAnnouncementRoutes(service: AnnouncementService): Router {
    const router = Router();

    /**
     * GET /universities
     *
     * Lists the supported universities in aggregation order.
     */
    router.get('/universities', (req: Request, res: Response) => {
        res.json({ data: service.listUniversities() });
    });

    /**
     * GET /announcements?limit=&offset=
     *
     * Scrapes every university and returns one page of the combined list.
     */
    router.get(
        '/announcements',
        asyncHandler(async (req: Request, res: Response) => {
            const params = parsePagination(req.query);
            const announcements = await service.collectAll(abortOnDisconnect(res));

            if (announcements.length === 0) {
                throw new NotFoundError('No announcements found');
            }

            res.json(paginate(announcements, params));
        })
    );

    /**
     * GET /announcements/:university?limit=&offset=
     *
     * Scrapes a single university. The name is matched case-insensitively.
     */
    router.get(
        '/announcements/:university',
        asyncHandler(async (req: Request, res: Response) => {
            const { university } = req.params;
            const params = parsePagination(req.query);

            const source = service.findSource(university);
            if (!source) {
                throw new NotFoundError(`University '${university}' not found`);
            }

            const announcements = await service.collectFrom(source, abortOnDisconnect(res));
            if (announcements.length === 0) {
                throw new NotFoundError(`No announcements found for ${university}`);
            }

            res.json(paginate(announcements, params));
        })
    );

    return router;
}

/**
 * Signal that fires if the client goes away before the response is written.
 */
function abortOnDisconnect(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableEnded) {
            controller.abort();
        }
    });
    return controller.signal;
}
