import { APIError, CatalogGateway, NotFoundError, PageView, SearchContext } from './types/interfaces';
import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import cors from 'cors';
import ejs from 'ejs';
import path from 'path';
import { AppConfig } from './config';
import { DEFAULT_SEARCH_TYPE, createCatalogService } from './services';
import { formatDuration, formatNumber } from './format';

// Compiled output lives in dist/, templates stay at the project root
const views_path = path.basename(__dirname) === 'dist'
    ? path.join(__dirname, '..', 'templates')
    : path.join(__dirname, 'templates');

const ID_PATTERN = /^\d+$/;

// Deezer identifiers are numeric; anything else cannot name a resource
function resourceId(req: Request): string {
    const id = req.params.id;
    if (!id || !ID_PATTERN.test(id)) {
        throw new NotFoundError(`Unknown resource id "${id ?? ''}"`);
    }
    return id;
}

function render(res: Response, view: PageView): void {
    res.render(view.template, view.context);
}

// Express 4 does not forward rejected promises to the error handler
function page(build: (req: Request) => Promise<PageView>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve()
            .then(() => build(req))
            .then(view => render(res, view))
            .catch(next);
    };
}

function queryString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

export interface AppDependencies {
    config: Pick<AppConfig, 'resultLimit'>;
    gateway: CatalogGateway;
}

export function createApp({ config, gateway }: AppDependencies): express.Express {
    const catalog = createCatalogService(gateway, { resultLimit: config.resultLimit });

    // Building the app
    const app = express();
    app.use((req, res, next) => {
        console.log(`${new Date().toISOString()} - ${req.method} ${req.url}`);
        next();
    });
    app.use('/static', express.static(path.join(views_path, 'static')))
        .use(cors())
        .engine('html', (filePath, options, callback) => {
            ejs.renderFile(filePath, { ...options }, callback);
        })
        .set('view engine', 'html')
        .set('views', views_path);

    app.locals.formatNumber = formatNumber;
    app.locals.formatDuration = formatDuration;

    // Routes
    app.get('/', page(() => catalog.home()));

    // Search failures, template errors included, stay on the search page
    app.get('/search', (req: Request, res: Response, next: NextFunction) => {
        const query = queryString(req.query.q) ?? '';
        const searchType = queryString(req.query.type) || DEFAULT_SEARCH_TYPE;

        const renderFailure = (error: unknown) => {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Search failed: ${message}`, error);
            const context: SearchContext = { results: null, query, search_type: searchType, error: message };
            res.render('search.html', context, (err, html) => (err ? next(err) : res.send(html)));
        };

        Promise.resolve()
            .then(() => catalog.search(query, searchType))
            .then(view => {
                res.render(view.template, view.context, (err, html) => (err ? renderFailure(err) : res.send(html)));
            })
            .catch(renderFailure);
    });

    app.get('/user/:id', page(req => catalog.user(resourceId(req))));
    app.get('/track/:id', page(req => catalog.track(resourceId(req))));
    app.get('/editorial', page(() => catalog.editorials()));
    app.get('/editorial/:id', page(req => catalog.editorialSelection(resourceId(req))));
    app.get('/album/:id', page(req => catalog.album(resourceId(req))));
    app.get('/artist/:id', page(req => catalog.artist(resourceId(req))));
    app.get('/playlist/:id', page(req => catalog.playlist(resourceId(req))));
    app.get('/genre', page(() => catalog.genres()));
    app.get('/radio', page(() => catalog.radios()));
    app.get('/episode/:id', page(req => catalog.episode(resourceId(req))));

    app.use((req: Request, res: Response, next: NextFunction) => {
        next(new NotFoundError(`No page at ${req.path}`));
    });

    // Handler failures surface as 404 or 500 only; an undecodable path parameter is a 404
    app.use((err: APIError, req: Request, res: Response, _next: NextFunction) => {
        const statusCode = err.statusCode === 404 || err instanceof URIError ? 404 : 500;
        if (statusCode >= 500) {
            console.error('Unhandled error:', err);
        } else {
            console.log(`${statusCode} - ${err.message}`);
        }
        res.status(statusCode).render('error.html', {
            status: statusCode,
            message: statusCode >= 500 ? 'Internal Server Error' : err.message
        });
    });

    return app;
}
