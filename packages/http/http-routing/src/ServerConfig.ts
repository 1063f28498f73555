import { InvalidArgumentError } from '@tollgate/http-api';

/**
 * ServerConfig - server settings plus free-form properties.
 *
 * Properties feed components that look settings up by name, e.g. the
 * ManagedClientRegistry reads `<clientName>.baseUri`.
 */
export class ServerConfig {
    port: number;

    /**
     * Base URL managed clients resolve relative base URIs against. Defaults to
     * the loopback address and listening port once the server starts.
     */
    baseUrl?: string;

    properties: Map<string, string>;

    constructor(port: number = 8200, baseUrl?: string, properties?: Map<string, string>) {
        this.port = port;
        this.baseUrl = baseUrl;
        this.properties = properties ?? new Map();
    }

    property(name: string, value: string): ServerConfig {
        this.properties.set(name, value);
        return this;
    }

    getProperty(name: string): string | undefined {
        return this.properties.get(name);
    }

    /**
     * Reads PORT and BASE_URL. Absent values keep the defaults.
     *
     * @throws InvalidArgumentError when PORT is not a port number
     */
    static fromEnv(env: Record<string, string | undefined>): ServerConfig {
        const config = new ServerConfig();

        const port = env['PORT'];
        if (port !== undefined && port !== '') {
            const parsed = Number(port);
            if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
                throw new InvalidArgumentError(`PORT must be a number between 0 and 65535, was '${port}'`);
            }
            config.port = parsed;
        }

        const baseUrl = env['BASE_URL'];
        if (baseUrl) {
            config.baseUrl = baseUrl;
        }

        return config;
    }
}

/**
 * DI token for ServerConfig injection.
 */
export const SERVER_CONFIG_TOKEN = Symbol.for('ServerConfig');
