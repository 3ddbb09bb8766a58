import { fromNodeProviderChain } from '@aws-sdk/credential-providers';
import { Env } from './env';
import { CredentialError, describeError } from './errors';
import { StorageCredential } from './types';

export type CredentialSource = () => Promise<StorageCredential>;

// Chaves estáticas quando configuradas; senão a cadeia padrão do SDK
// (env, perfil compartilhado, metadata de container/instância)
// A cadeia é criada a cada chamada para não reaproveitar credencial entre requisições
export function createCredentialSource(
  config: Pick<Env, 'STORAGE_ACCESS_KEY_ID' | 'STORAGE_SECRET_ACCESS_KEY' | 'STORAGE_SESSION_TOKEN'>,
): CredentialSource {
  const accessKeyId = config.STORAGE_ACCESS_KEY_ID;
  const secretAccessKey = config.STORAGE_SECRET_ACCESS_KEY;
  if (accessKeyId && secretAccessKey) {
    return async () => ({ accessKeyId, secretAccessKey, sessionToken: config.STORAGE_SESSION_TOKEN });
  }
  return async () => {
    try {
      return await fromNodeProviderChain()();
    } catch (error) {
      throw new CredentialError(describeError(error), { cause: error });
    }
  };
}
