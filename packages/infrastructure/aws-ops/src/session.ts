import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import { fromIni, fromNodeProviderChain } from '@aws-sdk/credential-providers';
import { AppError } from '@shared/errors';
import { fail, ok, type Result } from '@shared/result';
import type { CredentialProvider } from './types';

export class CredentialsError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('CREDENTIALS', message, { scope: 'fatal', cause });
  }
}

export interface SessionOptions {
  readonly profile?: string;
  /** Region used for the identity call only. */
  readonly homeRegion?: string;
}

export interface AwsSession {
  readonly accountId: string;
  readonly callerArn: string | null;
  readonly profile: string | null;
  readonly credentials: CredentialProvider;
}

export const buildCredentialProvider = (profile?: string): CredentialProvider =>
  profile ? fromIni({ profile }) : fromNodeProviderChain();

export const resolveHomeRegion = (options: SessionOptions): string =>
  options.homeRegion ?? process.env.AWS_REGION ?? process.env.AWS_DEFAULT_REGION ?? 'us-east-1';

/** Resolves credentials and the caller's account once for the whole run. */
export const openSession = async (options: SessionOptions = {}): Promise<Result<AwsSession, CredentialsError>> => {
  const credentials = buildCredentialProvider(options.profile);
  const client = new STSClient({ region: resolveHomeRegion(options), credentials });

  try {
    const identity = await client.send(new GetCallerIdentityCommand({}));
    if (!identity.Account) {
      return fail(new CredentialsError('caller identity returned no account id'));
    }
    return ok({
      accountId: identity.Account,
      callerArn: identity.Arn ?? null,
      profile: options.profile ?? null,
      credentials,
    });
  } catch (error) {
    const source = options.profile ? `profile "${options.profile}"` : 'the default credential chain';
    return fail(new CredentialsError(`could not resolve AWS credentials from ${source}`, error));
  } finally {
    client.destroy();
  }
};
