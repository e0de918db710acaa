import { ManagementClient } from '../../lib/client/management-client.js';
import { render } from '../logger.js';

/** Options for the add command. */
export interface AddOptions {
  host: string;
  keyAuthorization: string;
  server: string;
}

/** Register a TLS-ALPN-01 challenge on a running server. */
export async function handleAddCommand(options: AddOptions) {
  const client = new ManagementClient({ baseUrl: options.server });
  await client.addTlsAlpn01(options.host, options.keyAuthorization);
  render.success(`Registered TLS-ALPN-01 challenge for ${options.host}`);
}
