import { injectable } from 'inversify';
import { ValidateImplementation } from '@tollgate/http-api';
import { Controller, provideSingleton } from '@tollgate/http-routing';
import { InternalApi } from '../api/InternalApi';

/**
 * InternalController - answers only once the route's header rule has passed;
 * RequireHeaderFilter turns every other request away with a 403.
 */
@injectable()
@provideSingleton()
@Controller()
export class InternalController implements InternalApi {
    private readonly __validator!: ValidateImplementation<InternalController, InternalApi>;

    async getA(): Promise<string> {
        return 'a';
    }

    async getB(): Promise<string> {
        return 'b';
    }
}
