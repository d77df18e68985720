import { createMnemyServices } from '@mnemy/shared';
import type { MnemyServices, MnemyServicesOptions } from '@mnemy/shared';

export type ServicesFactory = (options: MnemyServicesOptions) => Promise<MnemyServices>;

let servicesFactory: ServicesFactory = createMnemyServices;
let homeDir: string | undefined;

/**
 * Data directory chosen with the global `--home` option.
 */
export function setHome(home: string | undefined): void {
  homeDir = home;
}

/**
 * Replace how commands obtain their services (tests hand in prepared ones).
 */
export function setServicesFactory(factory: ServicesFactory): void {
  servicesFactory = factory;
}

export function resetServicesFactory(): void {
  servicesFactory = createMnemyServices;
}

/**
 * Run `fn` with freshly created services and dispose them afterwards.
 */
export async function withServices<T>(fn: (services: MnemyServices) => Promise<T>): Promise<T> {
  const services = await servicesFactory({ home: homeDir });
  try {
    return await fn(services);
  } finally {
    await services.dispose();
  }
}
