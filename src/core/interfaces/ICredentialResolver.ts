import type { AwsCredentialIdentity } from '@aws-sdk/types';

/**
 * Interface for resolving access credentials for a named profile
 */
export interface ICredentialResolver {
  resolve(profileName: string): Promise<AwsCredentialIdentity>;
}
