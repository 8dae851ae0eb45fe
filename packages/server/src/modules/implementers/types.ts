export interface ImplementerRequest {
  /** Full prompt: agent instructions plus task details */
  prompt: string;
  /** Absolute path of the repository to work in */
  projectPath: string;
  context?: Record<string, unknown>;
}

export interface ImplementerResult {
  success: boolean;
  output: string;
  error?: string;
  filesChanged?: string[];
}

/**
 * A tool that writes code inside a project (a coding CLI, for instance)
 */
export interface Implementer {
  readonly name: string;
  execute(request: ImplementerRequest): Promise<ImplementerResult>;
  isAvailable(): Promise<boolean>;
}
