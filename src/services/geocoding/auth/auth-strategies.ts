import { signUrl } from './url-signer';

export type AuthScheme = 'unauthenticated' | 'token' | 'signed';

/**
 * Finishes a base query for one authentication scheme.
 *
 * Implementations hold only immutable credentials, so one instance can be
 * shared by concurrent requests.
 */
export interface AuthStrategy {
    readonly scheme: AuthScheme;

    /**
     * @param query - Base query, `sensor=false` and operation parameters included
     * @param endpoint - Base URL the query will be appended to
     * @returns Query string ready to send
     * @throws {GeocoderConfigError} If the credentials cannot be applied
     */
    finish(query: string, endpoint: string): string;
}

export interface SignedCredentials {
    clientId: string;
    /** base64url encoded */
    privateKey: string;
    channel?: string | undefined;
}

export type ClientCredentials =
    | { scheme: 'unauthenticated' }
    | { scheme: 'token'; apiKey: string }
    | ({ scheme: 'signed' } & SignedCredentials);

export class UnauthenticatedAuth implements AuthStrategy {
    readonly scheme = 'unauthenticated' as const;

    finish(query: string): string {
        return query;
    }
}

/**
 * API key passed as `key=`
 */
export class TokenAuth implements AuthStrategy {
    readonly scheme = 'token' as const;

    constructor(private readonly apiKey: string) {}

    finish(query: string): string {
        return `${query}&key=${this.apiKey}`;
    }
}

/**
 * Client ID plus HMAC-SHA1 URL signature.
 *
 * Parameter order is `channel` (when set), `client`, then `signature`; the
 * signature covers everything before it.
 */
export class SignedAuth implements AuthStrategy {
    readonly scheme = 'signed' as const;
    private readonly clientId: string;
    private readonly privateKey: string;
    private readonly channel: string;

    constructor(credentials: SignedCredentials) {
        this.clientId = credentials.clientId;
        this.privateKey = credentials.privateKey;
        this.channel = credentials.channel ?? '';
    }

    finish(query: string, endpoint: string): string {
        let signedQuery = query;

        if (this.channel !== '') {
            signedQuery += `&channel=${this.channel}`;
        }
        signedQuery += `&client=${this.clientId}`;

        const signature = signUrl(`${endpoint}?${signedQuery}`, this.privateKey);

        return `${signedQuery}&signature=${signature}`;
    }
}

export function createAuthStrategy(credentials: ClientCredentials): AuthStrategy {
    switch (credentials.scheme) {
        case 'token':
            return new TokenAuth(credentials.apiKey);
        case 'signed':
            return new SignedAuth(credentials);
        case 'unauthenticated':
            return new UnauthenticatedAuth();
    }
}
