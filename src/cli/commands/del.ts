import { ManagementClient } from '../../lib/client/management-client.js';
import { render } from '../logger.js';

/** Options for the del command. */
export interface DelOptions {
  host: string;
  server: string;
}

/** Remove a TLS-ALPN-01 challenge from a running server. */
export async function handleDelCommand(options: DelOptions) {
  const client = new ManagementClient({ baseUrl: options.server });
  await client.deleteTlsAlpn01(options.host);
  render.success(`Removed TLS-ALPN-01 challenge for ${options.host}`);
}
