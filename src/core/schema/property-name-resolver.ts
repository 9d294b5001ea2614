import type { ContractProperty } from "../reflection/models/contract.js";

/**
 * Decides the serialized name of a contract property
 */
export interface PropertyNameResolver {
  resolvePropertyName(property: ContractProperty): string;
}

/**
 * Uses the explicit serialized name, falling back to the declared name
 */
export class DefaultPropertyNameResolver implements PropertyNameResolver {
  resolvePropertyName(property: ContractProperty): string {
    return property.jsonName ?? property.name;
  }
}

export class CamelCasePropertyNameResolver implements PropertyNameResolver {
  resolvePropertyName(property: ContractProperty): string {
    if (property.jsonName) return property.jsonName;
    return property.name.charAt(0).toLowerCase() + property.name.slice(1);
  }
}
