import {
  TenantValidationDeclaration,
  TenantValidationOptions,
  declareTenantValidation,
} from "./TenantValidationDeclaration";

export interface ComponentGuardDefinition {
  /** Declaration applied to every operation without its own */
  defaults?: TenantValidationOptions;
  /** Per-operation declarations; each one replaces the default entirely */
  operations?: Record<string, TenantValidationOptions>;
}

interface ComponentGuards {
  defaults: TenantValidationDeclaration | null;
  operations: Map<string, TenantValidationDeclaration>;
}

/**
 * Declarations by component and operation
 */
export class TenantGuardRegistry {
  private readonly components = new Map<string, ComponentGuards>();

  register(component: string, definition: ComponentGuardDefinition): this {
    const operations = new Map<string, TenantValidationDeclaration>();
    for (const [operation, options] of Object.entries(definition.operations ?? {})) {
      operations.set(operation, declareTenantValidation(options));
    }

    this.components.set(component, {
      defaults: definition.defaults ? declareTenantValidation(definition.defaults) : null,
      operations,
    });
    return this;
  }

  /**
   * The operation's own declaration if present, else the component default,
   * else null for an unguarded operation. Declarations are never merged.
   */
  resolve(component: string, operation: string): TenantValidationDeclaration | null {
    const guards = this.components.get(component);
    if (!guards) {
      return null;
    }
    return guards.operations.get(operation) ?? guards.defaults;
  }

  has(component: string): boolean {
    return this.components.has(component);
  }

  getComponents(): string[] {
    return [...this.components.keys()];
  }
}
