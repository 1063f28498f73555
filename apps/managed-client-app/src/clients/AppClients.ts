import { ClientConfig, InjectHeaderFilter, ManagedClientDefinition } from '@tollgate/http-client';
import { AppHeaderRules } from '../routes/AppHeaderRules';

/**
 * Managed clients of this application.
 *
 * - clientA: base URI 'internal', relative to the server's own base URL,
 *   injecting custom-header: a
 * - clientB: no base URI, so the server's base URL, injecting custom-header: b
 *
 * Either base URI can be overridden with the property `<name>.baseUri`.
 */
export class AppClients {
    static readonly CLIENT_A = 'clientA';
    static readonly CLIENT_B = 'clientB';

    static definitions(): ManagedClientDefinition[] {
        return [
            new ManagedClientDefinition(
                AppClients.CLIENT_A,
                new ClientConfig('internal').register(new InjectHeaderFilter(AppHeaderRules.REQUIRE_A)),
            ),
            new ManagedClientDefinition(
                AppClients.CLIENT_B,
                new ClientConfig().register(new InjectHeaderFilter(AppHeaderRules.REQUIRE_B)),
            ),
        ];
    }
}
