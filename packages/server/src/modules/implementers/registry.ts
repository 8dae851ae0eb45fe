import { ValidationError } from "../../types.js";
import type { CliImplementerOptions } from "./cli-implementer.js";
import { CLAUDE_CODE, createClaudeCodeImplementer } from "./claude-code.js";
import { CURSOR_CLI, createCursorCliImplementer } from "./cursor-cli.js";
import type { Implementer } from "./types.js";

export type ImplementerFactory = (options: CliImplementerOptions) => Implementer;

export const DEFAULT_IMPLEMENTER_FACTORIES: Readonly<Record<string, ImplementerFactory>> = {
  [CLAUDE_CODE]: createClaudeCodeImplementer,
  [CURSOR_CLI]: createCursorCliImplementer,
};

/**
 * Name -> implementer lookup. Instances are created on first use and reused.
 */
export class ImplementerRegistry {
  private readonly factories: Map<string, ImplementerFactory>;
  private readonly instances = new Map<string, Implementer>();

  public constructor(
    private readonly options: CliImplementerOptions = {},
    factories: Readonly<Record<string, ImplementerFactory>> = DEFAULT_IMPLEMENTER_FACTORIES
  ) {
    this.factories = new Map(Object.entries(factories));
  }

  public register(name: string, factory: ImplementerFactory): void {
    this.factories.set(name, factory);
    this.instances.delete(name);
  }

  public names(): string[] {
    return [...this.factories.keys()];
  }

  public get(name: string): Implementer {
    const cached = this.instances.get(name);
    if (cached) return cached;

    const factory = this.factories.get(name);
    if (!factory) {
      throw new ValidationError(
        `Unknown implementer: ${name}. Available: ${this.names().join(", ")}`,
        { available: this.names() }
      );
    }

    const implementer = factory(this.options);
    this.instances.set(name, implementer);
    return implementer;
  }
}
