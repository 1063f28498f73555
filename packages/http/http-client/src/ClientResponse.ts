/**
 * ClientResponse - status, headers and the fully read body of a response.
 */
export class ClientResponse {
    /**
     * Lowercase header name -> value.
     */
    readonly headers: Map<string, string>;

    constructor(
        readonly status: number,
        headers: Map<string, string>,
        readonly body: string,
    ) {
        this.headers = new Map();
        for (const [name, value] of headers) {
            this.headers.set(name.toLowerCase(), value);
        }
    }

    /**
     * 2xx, except 266 which carries a user error (see HttpUserError).
     */
    get ok(): boolean {
        return this.status >= 200 && this.status < 300 && this.status !== 266;
    }

    get contentType(): string | undefined {
        return this.getHeaderString('content-type');
    }

    getHeaderString(name: string): string | undefined {
        return this.headers.get(name.toLowerCase());
    }

    readText(): string {
        return this.body;
    }

    readJson<T>(): T {
        return JSON.parse(this.body);
    }

    toJSON(): { status: number; body: string } {
        return { status: this.status, body: this.body };
    }
}
