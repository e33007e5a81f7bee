import type { ProtocolName } from '../config/schema.js';
import type { Protocol } from '../types.js';
import { toCamelCase, toPascalCase } from './casing.js';
import { ODataQueryBuilder } from './odata-builder.js';

abstract class ODataProtocol implements Protocol {
  abstract readonly name: ProtocolName;

  abstract casingFunction(name: string): string;

  createQueryBuilder(): ODataQueryBuilder {
    return new ODataQueryBuilder();
  }
}

/** Graph-style endpoints: camelCase field names. */
export class GraphProtocol extends ODataProtocol {
  override readonly name = 'graph' as const;

  override casingFunction(name: string): string {
    return toCamelCase(name);
  }
}

/** Office-style endpoints: PascalCase field names. */
export class OfficeProtocol extends ODataProtocol {
  override readonly name = 'office' as const;

  override casingFunction(name: string): string {
    return toPascalCase(name);
  }
}

export function createProtocol(config: { protocol: ProtocolName }): GraphProtocol | OfficeProtocol {
  return config.protocol === 'office' ? new OfficeProtocol() : new GraphProtocol();
}
