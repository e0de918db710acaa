import { z } from 'zod';

const NOT_AN_OBJECT = 'request body must be a JSON object';
const HOST_REQUIRED = '"host" must be a non-empty string';
const CONTENT_REQUIRED = '"content" must be a string';

const HostField = z
  .string({ required_error: HOST_REQUIRED, invalid_type_error: HOST_REQUIRED })
  .min(1, HOST_REQUIRED);

// --- TLS-ALPN-01 challenges ---

export const HostBody = z.object({ host: HostField }, { invalid_type_error: NOT_AN_OBJECT });

export const AddTlsAlpn01Body = z.object(
  {
    host: HostField,
    content: z.string({ required_error: CONTENT_REQUIRED, invalid_type_error: CONTENT_REQUIRED }),
  },
  { invalid_type_error: NOT_AN_OBJECT },
);

export type HostRequest = z.infer<typeof HostBody>;
export type AddTlsAlpn01Request = z.infer<typeof AddTlsAlpn01Body>;

// --- Validation helper ---

export function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
): { success: true; data: z.output<S> } | { success: false; error: string } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error.issues[0]?.message ?? 'invalid request body' };
}
