import { Clock, systemClock } from './clock.js';
import { AuthError, describeError } from './errors.js';
import { JsonResponse, requestJson } from './http.js';
import { Logger, logger } from './log.js';
import { Credential, ServiceConfig } from './types.js';
import { ajv, formatErrors } from './validation.js';

const DEFAULT_SCHEME = 'Bearer';
const DEFAULT_EXPIRES_IN_SECONDS = 3600;

interface TokenResponse {
  access_token?: string;
  token_type?: string;
  expires_in?: number | string;
}

const validateTokenResponse = ajv.compile<TokenResponse>({
  type: 'object',
  properties: {
    access_token: { type: 'string' },
    token_type: { type: 'string' },
    expires_in: { type: ['number', 'string'] }
  }
});

type BrokerConfig = Pick<
  ServiceConfig,
  | 'tokenUrl'
  | 'tokenClientId'
  | 'tokenClientSecret'
  | 'tokenScope'
  | 'tokenGrantType'
  | 'tokenApiKey'
  | 'tokenSafetyMarginMs'
  | 'amenitiesApiKey'
  | 'userAgent'
  | 'deviceOs'
  | 'requestTimeoutMs'
>;

function parseExpiresIn(value: number | string | undefined): number {
  const seconds = typeof value === 'string' ? Number.parseInt(value, 10) : value;
  return seconds !== undefined && Number.isFinite(seconds) && seconds > 0 ? seconds : DEFAULT_EXPIRES_IN_SECONDS;
}

/**
 * Issues the bearer credential used by the amenity APIs.
 *
 * The credential is cached until `expires_in` minus a safety margin has elapsed. Concurrent
 * callers that find it expired share a single token request. A failed refresh leaves the
 * previous (expired) credential in place; it is never handed out again.
 */
export class CredentialBroker {
  private cached?: Credential;
  private inflight?: Promise<Credential>;
  private readonly log: Logger;

  constructor(
    private readonly config: BrokerConfig,
    private readonly clock: Clock = systemClock,
    log: Logger = logger
  ) {
    this.log = log.child({ component: 'credentialBroker' });
  }

  async getCredential(): Promise<Credential> {
    const cached = this.cached;
    if (cached && this.clock.now() < cached.expiresAt) {
      return cached;
    }

    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  /** Headers sent on every amenity search and detail call. */
  async authorizedHeaders(): Promise<Record<string, string>> {
    if (!this.config.amenitiesApiKey) {
      throw new AuthError('AMENITIES_API_KEY is not configured');
    }
    const credential = await this.getCredential();
    return {
      accept: 'application/json',
      'user-agent': this.config.userAgent,
      deviceos: this.config.deviceOs,
      'x-apikey': this.config.amenitiesApiKey,
      authorization: `${credential.scheme} ${credential.token}`
    };
  }

  private async refresh(): Promise<Credential> {
    const { tokenUrl, tokenClientId, tokenClientSecret, tokenScope, tokenApiKey } = this.config;
    const missing = [
      ['TOKEN_URL', tokenUrl],
      ['TOKEN_CLIENT_ID', tokenClientId],
      ['TOKEN_CLIENT_SECRET', tokenClientSecret],
      ['TOKEN_SCOPE', tokenScope],
      ['TOKEN_X_API_KEY', tokenApiKey]
    ]
      .filter(([, value]) => !value)
      .map(([name]) => name);

    if (!tokenUrl || !tokenClientId || !tokenClientSecret || !tokenScope || !tokenApiKey) {
      this.log.error('Token configuration incomplete', { missing });
      throw new AuthError(`Missing token configuration: ${missing.join(', ')}`);
    }

    // Shared by every waiting caller, so no caller's signal is attached.
    let response: JsonResponse;
    try {
      response = await requestJson(
        {
          service: 'token',
          url: tokenUrl,
          method: 'POST',
          headers: { 'x-api-key': tokenApiKey },
          body: {
            client_id: tokenClientId,
            client_secret: tokenClientSecret,
            scope: tokenScope,
            grant_type: this.config.tokenGrantType
          },
          timeoutMs: this.config.requestTimeoutMs
        },
        this.log
      );
    } catch (error) {
      this.log.error('Token request failed', { error: describeError(error) });
      throw new AuthError('Token request failed', { cause: error });
    }

    if (!response.ok) {
      throw new AuthError(`Token endpoint returned status ${response.status}`);
    }

    const body = response.body;
    if (!validateTokenResponse(body)) {
      throw new AuthError(`Token response is malformed: ${formatErrors(validateTokenResponse.errors)}`);
    }
    if (!body.access_token) {
      throw new AuthError("Token response missing 'access_token'");
    }

    const expiresIn = parseExpiresIn(body.expires_in);
    const credential: Credential = {
      token: body.access_token,
      scheme: body.token_type || DEFAULT_SCHEME,
      expiresAt: this.clock.now() + expiresIn * 1000 - this.config.tokenSafetyMarginMs
    };
    this.cached = credential;

    this.log.info('Fetched new credential', { scheme: credential.scheme, expiresIn });
    return credential;
  }
}
