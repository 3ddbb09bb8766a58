import { LocatorFormatError } from './errors';
import { ContainerLocator, Result, StorageLocator, err, ok } from './types';

export const INVALID_OBJECT_URL = 'Invalid object URL format. URL must include container name and object path.';
export const INVALID_CONTAINER_URL = 'Invalid container URL format. URL must include container name.';

type SplitUrl = { accountName: string; segments: string[] };

// Função que separa a URL em conta (primeiro label do host) e segmentos do path
// O host já vem em minúsculas do parser de URL
function splitUrl(url: string, message: string): Result<SplitUrl, LocatorFormatError> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (cause) {
    return err(new LocatorFormatError(message, url, { cause }));
  }

  const accountName = parsed.hostname.split('.')[0];
  if (!accountName) return err(new LocatorFormatError(message, url));

  // Barras no início e no fim são descartadas, as do meio fazem parte da chave
  const trimmed = parsed.pathname.replace(/^\/+|\/+$/g, '');
  if (!trimmed) return ok({ accountName, segments: [] });

  try {
    return ok({ accountName, segments: trimmed.split('/').map((s) => decodeURIComponent(s)) });
  } catch (cause) {
    return err(new LocatorFormatError(message, url, { cause }));
  }
}

export function parseObjectLocator(url: string): Result<StorageLocator, LocatorFormatError> {
  const split = splitUrl(url, INVALID_OBJECT_URL);
  if (!split.ok) return split;

  const [containerName, ...rest] = split.value.segments;
  if (!containerName || rest.length === 0) {
    return err(new LocatorFormatError(INVALID_OBJECT_URL, url));
  }
  return ok({ accountName: split.value.accountName, containerName, objectPath: rest.join('/') });
}

// Para o destino só o container importa; o resto do path é ignorado
export function parseContainerLocator(url: string): Result<ContainerLocator, LocatorFormatError> {
  const split = splitUrl(url, INVALID_CONTAINER_URL);
  if (!split.ok) return split;

  const [containerName] = split.value.segments;
  if (!containerName) return err(new LocatorFormatError(INVALID_CONTAINER_URL, url));
  return ok({ accountName: split.value.accountName, containerName });
}
