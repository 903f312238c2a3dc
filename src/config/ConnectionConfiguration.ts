/**
 * Connection Configuration
 *
 * Consumer-side rules for the validated connection parameters:
 * - a non-empty private key wins over the password, which is then ignored
 * - image parameters (sftp_host, sftp_port) set by the platform override
 *   the user's hostname and port
 */

import { z } from 'zod';
import { UserError } from '../errors/ComponentErrors.js';

export const DEFAULT_SFTP_PORT = 22;

export const KEY_HOSTNAME = 'hostname';
export const KEY_PORT = 'port';
export const KEY_USER = 'user';
export const KEY_PASSWORD = '#pass';
export const KEY_PRIVATE_KEY = '#private_key';

export const KEY_HOSTNAME_IMAGE = 'sftp_host';
export const KEY_PORT_IMAGE = 'sftp_port';

/**
 * Connection parameters as they come out of configSchema.json validation
 */
export interface ConnectionParameters {
  hostname: string;
  port: number;
  user: string;
  '#pass': string;
  '#private_key': string;
}

export const ImageParametersSchema = z
  .object({
    [KEY_HOSTNAME_IMAGE]: z.string().optional(),
    [KEY_PORT_IMAGE]: z.number().int().positive().optional(),
  })
  .passthrough();

export type ImageParameters = z.infer<typeof ImageParametersSchema>;

export type Credentials =
  | { method: 'privateKey'; privateKey: string }
  | { method: 'password'; password: string };

export interface ResolvedConnection {
  host: string;
  port: number;
  user: string;
  credentials: Credentials;
}

/**
 * Pick the credential the SFTP client should use.
 * @throws UserError when neither a private key nor a password is set
 */
export function resolveCredentials(
  parameters: Pick<ConnectionParameters, '#pass' | '#private_key'>
): Credentials {
  const privateKey = parameters[KEY_PRIVATE_KEY];
  if (privateKey.trim() !== '') {
    return { method: 'privateKey', privateKey };
  }
  const password = parameters[KEY_PASSWORD];
  if (password !== '') {
    return { method: 'password', password };
  }
  throw new UserError(
    `Either "${KEY_PRIVATE_KEY}" or "${KEY_PASSWORD}" must be filled in`
  );
}

/**
 * Any image parameters at all mean the platform supplies the connection,
 * and then both sftp_host and sftp_port are expected.
 */
export function hasImageConnectionOverride(imageParameters: ImageParameters | undefined): boolean {
  return imageParameters !== undefined && Object.keys(imageParameters).length > 0;
}

export function resolveConnection(
  parameters: ConnectionParameters,
  imageParameters?: ImageParameters
): ResolvedConnection {
  return {
    host: imageParameters?.[KEY_HOSTNAME_IMAGE] || parameters.hostname,
    port: imageParameters?.[KEY_PORT_IMAGE] ?? parameters.port,
    user: parameters.user,
    credentials: resolveCredentials(parameters),
  };
}

/**
 * e.g. "writer@sftp.example.com:22 (Private Key Authentication)"
 */
export function getConnectionSummary(connection: ResolvedConnection): string {
  const method =
    connection.credentials.method === 'privateKey' ? 'Private Key' : 'Password';
  return `${connection.user}@${connection.host}:${connection.port} (${method} Authentication)`;
}
