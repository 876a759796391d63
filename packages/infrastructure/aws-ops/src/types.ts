import type { fromNodeProviderChain } from '@aws-sdk/credential-providers';
import type { RetryPolicy } from './retry';

export type CredentialProvider = ReturnType<typeof fromNodeProviderChain>;

export interface AwsClientOptions {
  readonly region: string;
  readonly credentials?: CredentialProvider;
}

export interface AdapterOptions extends AwsClientOptions {
  readonly retry: RetryPolicy;
}

/**
 * The SDK's own retry layer is switched off; `withRetry` is the only place a
 * call is repeated.
 */
export const sdkClientConfig = (options: AwsClientOptions) => ({
  region: options.region,
  maxAttempts: 1,
  ...(options.credentials ? { credentials: options.credentials } : {}),
});
