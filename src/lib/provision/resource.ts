import { BootstrapError, type ExitCode, errorMessage } from '../errors.ts';
import { logger } from '../logger.ts';

export interface ResourceSpec {
  name: string;
  isSatisfied(): boolean;
  acquire(): Promise<void>;
  /**
   * Success criterion checked after acquiring. Defaults to isSatisfied.
   */
  verify?(): boolean;
  failure: ExitCode;
}

export type ResourceOutcome = 'present' | 'acquired';

/**
 * Skips a resource that is already in place, otherwise acquires it and checks the result.
 * A clean acquire is not enough: the verification decides.
 * Any error that is not already a BootstrapError is reported with the resource's failure code.
 */
export async function ensureResource(resource: ResourceSpec): Promise<ResourceOutcome> {
  try {
    return await ensure(resource);
  } catch (err: unknown) {
    if (err instanceof BootstrapError) throw err;
    throw new BootstrapError(resource.failure, `${resource.name}: ${errorMessage(err)}`);
  }
}

async function ensure(resource: ResourceSpec): Promise<ResourceOutcome> {
  if (resource.isSatisfied()) {
    logger.success(`${resource.name} is already installed.`);
    return 'present';
  }

  await resource.acquire();

  const verified = resource.verify ? resource.verify() : resource.isSatisfied();
  if (!verified) {
    throw new BootstrapError(resource.failure, `${resource.name} installation could not be verified.`);
  }

  logger.success(`${resource.name} installed.`);
  return 'acquired';
}
