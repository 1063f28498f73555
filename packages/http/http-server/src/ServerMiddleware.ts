import { Request, Response, NextFunction } from 'express';
import { injectable } from 'inversify';
import { provideSingleton, MethodMeta } from '@tollgate/http-routing';
import { RouteMetadata } from '@tollgate/http-api';
import { ResponseWrapper, Service } from '@tollgate/http-filters';
import { RequestContext } from '@tollgate/core-context';
import { toError } from '@tollgate/core-util';
import { EncodedResponse, ResponseEncoder, decodeRequestBody } from './ResponseEncoder';

/**
 * ExpressWrapper - one route's Express handler: opens the RequestContext, builds
 * MethodMeta from the request, runs the filter chain and writes the result.
 */
export class ExpressWrapper {
    constructor(
        private service: Service<MethodMeta, ResponseWrapper<unknown>>,
        private routeMeta: RouteMetadata,
        private encoder: ResponseEncoder,
    ) {}

    public async execute(req: Request, res: Response, next: NextFunction): Promise<void> {
        await RequestContext.run(async () => {
            try {
                const bodyText = ['POST', 'PUT', 'PATCH'].includes(req.method) ? await this.readRequestBody(req) : undefined;
                const requestDto = decodeRequestBody(req.method, bodyText);
                const methodMeta = new MethodMeta(this.routeMeta, MethodMeta.headersFrom(req.headers), requestDto);

                const wrapper = await this.service.invoke(methodMeta);
                this.write(res, this.encoder.encode(wrapper));
            } catch (err: unknown) {
                this.handleError(res, err);
            }
        });
    }

    /**
     * Errors become a ProtocolError JSON body (symmetric with ClientErrorTranslator).
     */
    public handleError(res: Response, error: unknown): void {
        if (res.headersSent) {
            console.error('[ExpressWrapper] Error after response was sent:', toError(error));
            return;
        }
        this.write(res, this.encoder.encodeError(error));
    }

    private write(res: Response, encoded: EncodedResponse): void {
        res.status(encoded.statusCode);
        for (const [name, value] of encoded.headers) {
            res.setHeader(name, value);
        }
        res.setHeader('Content-Type', encoded.contentType);
        res.send(encoded.body);
    }

    /**
     * Raw body as text; JSON is parsed by decodeRequestBody rather than express.json().
     */
    private async readRequestBody(req: Request): Promise<string> {
        return new Promise((resolve, reject) => {
            let body = '';
            req.on('data', (chunk: Buffer) => {
                body += chunk.toString();
            });
            req.on('end', () => {
                resolve(body);
            });
            req.on('error', (err: Error) => {
                reject(err);
            });
        });
    }
}

/**
 * ServerMiddleware - Express middleware layered in front of the routes:
 * 1. globalErrorHandler - outermost safety net, answers a plain HTML 500
 * 2. logNextLayer - request/response trace
 */
@provideSingleton()
@injectable()
export class ServerMiddleware {
    constructor() {}

    async globalErrorHandler(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            // await catches synchronous throws from next() and rejections alike
            await next();
        } catch (err: unknown) {
            const error = toError(err);
            console.error('[GlobalErrorHandler] Caught unhandled error:', error);
            if (!res.headersSent) {
                res.status(500).send(
                    '<!DOCTYPE html><html><head><title>Server Error</title></head>' +
                        '<body><h1>You hit a server error</h1></body></html>',
                );
            }
        }
    }

    async logNextLayer(req: Request, res: Response, next: NextFunction): Promise<void> {
        console.log(`[LogNextLayer] ${req.method} ${req.path}`);
        await next();
    }

    createExpressWrapper(
        service: Service<MethodMeta, ResponseWrapper<unknown>>,
        routeMeta: RouteMetadata,
        encoder: ResponseEncoder,
    ): ExpressWrapper {
        return new ExpressWrapper(service, routeMeta, encoder);
    }
}
