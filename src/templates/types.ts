// Template-specific types
export interface TemplateGenerator<TInput> {
  generate(input: TInput): Promise<string>;
}

export interface CopyInstruction {
  source: string;
  destination: string;
}

/**
 * Declarative container build recipe. Every step is fatal to the build except
 * the `optionalPythonPackages` installs.
 */
export interface ImageRecipe {
  baseImage: string;
  workdir: string;
  /** Build/run time defaults, emitted in insertion order */
  env: Record<string, string>;
  systemPackages: string[];
  copy: CopyInstruction[];
  requirementsFile?: string;
  pythonPackages: string[];
  optionalPythonPackages: string[];
  /** Script started with unbuffered output as the container command */
  handler: string;
}
