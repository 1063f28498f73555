import { HeaderRule } from '@tollgate/http-api';
import { HeaderRuleRoutes } from '@tollgate/http-server';

/**
 * The rules shared by both sides: the internal routes require them, the
 * managed clients inject them.
 */
export class AppHeaderRules {
    static readonly REQUIRE_A = new HeaderRule('custom-header', 'a');
    static readonly REQUIRE_B = new HeaderRule('custom-header', 'b');

    static routes(): HeaderRuleRoutes {
        return new HeaderRuleRoutes()
            .require('GET', '/internal/a', AppHeaderRules.REQUIRE_A)
            .require('GET', '/internal/b', AppHeaderRules.REQUIRE_B);
    }
}
