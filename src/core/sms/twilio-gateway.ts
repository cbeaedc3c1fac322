import { AuthError, transientError } from '../auth-error.js';
import type { SmsGateway } from './sms-gateway.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type TwilioSmsGatewayOptions = {
  accountSid: string;
  authToken: string;
  /**
   * Sender number in E.164.
   */
  fromNumber: string;
  /**
   * Per-request timeout. Default 10s.
   */
  timeoutMs?: number;
  /**
   * Inject for tests; defaults to global fetch.
   */
  fetch?: FetchFn;
  baseUrl?: string;
};

const DEFAULT_BASE_URL = 'https://api.twilio.com/2010-04-01';

export function createTwilioSmsGateway(options: TwilioSmsGatewayOptions): SmsGateway {
  if (!options.accountSid || !options.authToken || !options.fromNumber) {
    throw new AuthError('configuration', 'twilio gateway requires accountSid, authToken and fromNumber');
  }
  const fetchFn: FetchFn = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? 10_000;
  const url = `${options.baseUrl ?? DEFAULT_BASE_URL}/Accounts/${encodeURIComponent(options.accountSid)}/Messages.json`;
  const authorization = `Basic ${Buffer.from(`${options.accountSid}:${options.authToken}`).toString('base64')}`;

  return {
    async send(phoneNumber, message) {
      const body = new URLSearchParams({ From: options.fromNumber, To: phoneNumber, Body: message });

      let res: Response;
      try {
        res = await fetchFn(url, {
          method: 'POST',
          headers: {
            authorization,
            'content-type': 'application/x-www-form-urlencoded'
          },
          body: body.toString(),
          signal: AbortSignal.timeout(timeoutMs)
        });
      } catch (err) {
        throw transientError('sms provider request failed', err);
      }

      if (!res.ok) {
        const detail = await readErrorDetail(res);
        throw transientError(
          `sms provider returned ${res.status}`,
          new Error(detail ? `twilio: ${detail}` : `twilio: HTTP ${res.status}`)
        );
      }
    }
  };
}

async function readErrorDetail(res: Response): Promise<string | undefined> {
  const text = await res.text().catch(() => '');
  if (!text) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === 'object' && 'message' in parsed && typeof parsed.message === 'string') {
      return parsed.message;
    }
  } catch {
    // Not JSON; fall through to the raw body.
  }
  return text.slice(0, 200);
}
