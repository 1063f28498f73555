import { inject, injectable } from 'inversify';
import { MediaType, ValidateImplementation } from '@tollgate/http-api';
import { ResponseWrapper } from '@tollgate/http-filters';
import { Controller, provideSingleton } from '@tollgate/http-routing';
import { ManagedClientRegistry } from '@tollgate/http-client';
import { PublicApi } from '../api/PublicApi';
import { AppClients } from '../clients/AppClients';

/**
 * PublicController - calls the internal routes through the managed clients,
 * which add the header each route requires.
 */
@injectable()
@provideSingleton()
@Controller()
export class PublicController implements PublicApi {
    private readonly __validator!: ValidateImplementation<PublicController, PublicApi>;

    constructor(@inject(ManagedClientRegistry) private clients: ManagedClientRegistry) {}

    async getTargetA(): Promise<string> {
        return this.clients.target(AppClients.CLIENT_A, 'a').request(MediaType.TEXT_PLAIN).getText();
    }

    async getTargetB(): Promise<ResponseWrapper<string>> {
        const response = await this.clients.target(AppClients.CLIENT_B, 'internal/b').request(MediaType.TEXT_PLAIN).get();

        return new ResponseWrapper<string>(response.readText(), response.status).withContentType(
            response.contentType ?? MediaType.TEXT_PLAIN,
        );
    }
}
