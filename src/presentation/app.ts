import express, { Application } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { AnnouncementService } from '../application/AnnouncementService';
import { SourceRegistry } from '../application/SourceRegistry';
import { IPageFetcher } from '../domain/ports/IPageFetcher';
import { AxiosPageFetcher } from '../infrastructure/scraper/AxiosPageFetcher';
import { BangaloreAnnouncementExtractor } from '../infrastructure/scraper/BangaloreAnnouncementExtractor';
import { GoaAnnouncementExtractor } from '../infrastructure/scraper/GoaAnnouncementExtractor';
import { MumbaiAnnouncementExtractor } from '../infrastructure/scraper/MumbaiAnnouncementExtractor';

// Route imports
import { createSystemRoutes } from './routes/systemRoutes';
import { createAnnouncementRoutes } from './routes/announcementRoutes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';

export interface AppDependencies {
    announcementService: AnnouncementService;
}

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, dependencies: AppDependencies = createDependencies(config)): Application {
    const app = express();

    // Middleware
    app.use(cors({
        origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
    }));

    // Routes
    app.use(createSystemRoutes());
    app.use(createAnnouncementRoutes(dependencies.announcementService));

    // Fallbacks (must be last)
    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 * Sources are registered in the order their announcements are aggregated.
 */
export function createDependencies(config: Config, fetcher?: IPageFetcher): AppDependencies {
    const pageFetcher = fetcher ?? new AxiosPageFetcher({
        timeout: config.scraper.timeoutMs,
        userAgent: config.scraper.userAgent,
        maxRedirects: config.scraper.maxRedirects,
    });

    const registry = new SourceRegistry([
        new BangaloreAnnouncementExtractor(pageFetcher),
        new GoaAnnouncementExtractor(pageFetcher),
        new MumbaiAnnouncementExtractor(pageFetcher),
    ]);

    return { announcementService: new AnnouncementService(registry) };
}
