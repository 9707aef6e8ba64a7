import { Request, Response, NextFunction } from 'express';

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    res.on('finish', () => {
        console.log(`[http] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
    });
    next();
};

export const notFound = (_req: Request, res: Response) => {
    res.status(404).type('text/plain').send('Not found');
};

// Four parameters are how Express tells an error handler apart
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    console.error(`[http] ${req.method} ${req.originalUrl} failed:`, err);
    res.status(500).type('text/plain').send('Something broke!');
};
