import { validateTlsAlpn01Challenge } from '../../lib/challenges/tls-alpn-validator.js';
import { parseListenAddress } from '../../lib/utils/address.js';
import { heading, kv, render } from '../logger.js';

/** Options for the check command. */
export interface CheckOptions {
  domain: string;
  keyAuthorization: string;
  /** `host:port` to dial instead of the domain on port 443 */
  connect?: string;
  timeout: number;
}

/**
 * Validate a TLS-ALPN-01 responder the way a CA would.
 *
 * @returns Whether validation passed
 */
export async function handleCheckCommand(options: CheckOptions): Promise<boolean> {
  const target = options.connect ? parseListenAddress(options.connect) : undefined;
  const result = await validateTlsAlpn01Challenge(options.domain, options.keyAuthorization, {
    ...(target?.host ? { host: target.host } : {}),
    ...(target ? { port: target.port } : {}),
    timeoutMs: options.timeout,
  });

  heading(`TLS-ALPN-01 check for ${options.domain}`);
  kv('ALPN', result.alpnProtocol || '<none>');
  if (result.certificate) {
    kv('Serial', result.certificate.serialNumber);
    kv('Not after', result.certificate.notAfter.toISOString());
  }

  if (result.ok) {
    render.success('Challenge certificate is valid');
  } else {
    render.error('Challenge certificate is not valid');
    render.bullets(result.reasons ?? []);
  }
  return result.ok;
}
