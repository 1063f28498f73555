import 'reflect-metadata';
import { Container, injectable } from 'inversify';
import { InvalidArgumentError, MediaType, RouteMetadata } from '@tollgate/http-api';
import { Filter, ResponseWrapper, Service } from '@tollgate/http-filters';
import { RouteBuilderImpl } from '../RouteBuilderImpl';
import { FilterDefinition, RouteDefinition, RouteFilterDefinition } from '../WebAppMeta';
import { MethodMeta } from '../MethodMeta';

const trace: string[] = [];

@injectable()
class TestController {
    async text(): Promise<string> {
        trace.push('controller');
        return 'text';
    }

    async created(requestDto: unknown): Promise<ResponseWrapper<unknown>> {
        return new ResponseWrapper<unknown>(requestDto, 201);
    }
}

@injectable()
class TraceFilter extends Filter<MethodMeta, ResponseWrapper<unknown>> {
    async filter(meta: MethodMeta, nextFilter: Service<MethodMeta, ResponseWrapper<unknown>>): Promise<ResponseWrapper<unknown>> {
        trace.push('trace-filter');
        return nextFilter.invoke(meta);
    }
}

class NamedRouteFilter extends Filter<MethodMeta, ResponseWrapper<unknown>> {
    constructor(private name: string) {
        super();
    }

    async filter(meta: MethodMeta, nextFilter: Service<MethodMeta, ResponseWrapper<unknown>>): Promise<ResponseWrapper<unknown>> {
        trace.push(this.name);
        return nextFilter.invoke(meta);
    }
}

const CONTROLLER_FILE = 'src/controllers/TestController.ts';

function textRoute(): RouteMetadata {
    const routeMeta = new RouteMetadata('GET', '/t/text', 'text');
    routeMeta.produces = MediaType.TEXT_PLAIN;
    return routeMeta;
}

describe('RouteBuilderImpl', () => {
    let container: Container;
    let builder: RouteBuilderImpl;

    beforeEach(() => {
        trace.length = 0;
        jest.spyOn(console, 'log').mockImplementation(() => undefined);

        container = new Container();
        container.bind(TestController).toSelf().inSingletonScope();
        container.bind(TraceFilter).toSelf().inSingletonScope();

        builder = new RouteBuilderImpl();
        builder.setContainer(container);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('requires a container before routes are added', () => {
        const unset = new RouteBuilderImpl();

        expect(() => unset.addRoute(new RouteDefinition(textRoute(), TestController))).toThrow(
            'Container not set. Call setContainer() before registering routes.',
        );
    });

    it('refuses the same METHOD:path twice', () => {
        builder.addRoute(new RouteDefinition(textRoute(), TestController, CONTROLLER_FILE));

        expect(() => builder.addRoute(new RouteDefinition(textRoute(), TestController, CONTROLLER_FILE))).toThrow(
            new InvalidArgumentError('Route GET:/t/text is registered twice'),
        );
    });

    it('refuses a route whose method is missing on the controller', () => {
        const routeMeta = new RouteMetadata('GET', '/t/nothing', 'nothing');

        expect(() => builder.addRoute(new RouteDefinition(routeMeta, TestController))).toThrow(
            'Method nothing not found on controller TestController',
        );
    });

    it('wraps a plain return value and applies the produced media type', async () => {
        builder.addRoute(new RouteDefinition(textRoute(), TestController, CONTROLLER_FILE));

        const routeService = builder.findRouteService('get', '/t/text');
        expect(routeService).toBeDefined();

        const response = await routeService?.service.invoke(new MethodMeta(textRoute()));
        expect(response?.statusCode).toBe(200);
        expect(response?.response).toBe('text');
        expect(response?.contentType).toBe('text/plain');
    });

    it('passes a ResponseWrapper from the controller through', async () => {
        const routeMeta = new RouteMetadata('POST', '/t/created', 'created');
        builder.addRoute(new RouteDefinition(routeMeta, TestController, CONTROLLER_FILE));

        const routeService = builder.findRouteService('POST', '/t/created');
        const response = await routeService?.service.invoke(new MethodMeta(routeMeta, undefined, { id: 1 }));

        expect(response?.statusCode).toBe(201);
        expect(response?.response).toEqual({ id: 1 });
        expect(response?.contentType).toBeUndefined();
    });

    it('finds a route without regard to case or a trailing slash', () => {
        builder.addRoute(new RouteDefinition(textRoute(), TestController, CONTROLLER_FILE));

        expect(builder.findRouteService('GET', '/T/Text/')?.routeMeta.path).toBe('/t/text');
        expect(builder.findRouteService('GET', '/t/text/extra')).toBeUndefined();
    });

    it('returns undefined for a route nobody registered', () => {
        expect(builder.findRouteService('GET', '/t/unknown')).toBeUndefined();
    });

    it('runs glob filters and route filters by priority, highest first', async () => {
        builder.addRoute(new RouteDefinition(textRoute(), TestController, CONTROLLER_FILE));
        builder.addFilter(new FilterDefinition(100, TraceFilter, 'src/controllers/**/*.ts'));
        builder.addRouteFilter(new RouteFilterDefinition(500, 'GET', '/t/text', new NamedRouteFilter('route-filter')));

        await builder.findRouteService('GET', '/t/text')?.service.invoke(new MethodMeta(textRoute()));

        expect(trace).toEqual(['route-filter', 'trace-filter', 'controller']);
    });

    it('skips filters whose glob does not match the controller file', async () => {
        builder.addRoute(new RouteDefinition(textRoute(), TestController, CONTROLLER_FILE));
        builder.addFilter(new FilterDefinition(100, TraceFilter, 'src/admin/**/*.ts'));

        await builder.findRouteService('GET', '/t/text')?.service.invoke(new MethodMeta(textRoute()));

        expect(trace).toEqual(['controller']);
    });

    it('builds each route chain once', () => {
        builder.addRoute(new RouteDefinition(textRoute(), TestController, CONTROLLER_FILE));

        const first = builder.findRouteService('GET', '/t/text');
        const second = builder.findRouteService('GET', '/t/text');

        expect(first?.service).toBe(second?.service);
    });

    it('accepts route filters for registered routes only', () => {
        builder.addRoute(new RouteDefinition(textRoute(), TestController, CONTROLLER_FILE));
        const filter = new NamedRouteFilter('route-filter');

        builder.addRouteFilter(new RouteFilterDefinition(1000, 'GET', '/t/text', filter));
        expect(() => builder.validateRouteFilters()).not.toThrow();

        builder.addRouteFilter(new RouteFilterDefinition(1000, 'GET', '/t/other', filter));
        expect(() => builder.validateRouteFilters()).toThrow('Route filter registered for unknown route GET:/t/other');
    });
});
