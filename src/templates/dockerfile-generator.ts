import { ImageRecipe, TemplateGenerator } from './types.js';

const PIP_INSTALL = 'pip install --no-cache-dir';

export class DockerfileGenerator implements TemplateGenerator<ImageRecipe> {
  async generate(recipe: ImageRecipe): Promise<string> {
    const sections: string[][] = [
      [
        '# Container image for the OCR serverless worker',
        `FROM ${recipe.baseImage}`
      ],
      this.envSection(recipe.env),
      this.systemPackagesSection(recipe.systemPackages),
      [`WORKDIR ${recipe.workdir}`],
      recipe.copy.map(entry => `COPY ${entry.source} ${entry.destination}`),
      this.pythonSection(recipe),
      this.optionalPackagesSection(recipe.optionalPythonPackages),
      [`CMD [${['python', '-u', recipe.handler].map(part => JSON.stringify(part)).join(', ')}]`]
    ];

    return sections
      .filter(section => section.length > 0)
      .map(section => section.join('\n'))
      .join('\n\n') + '\n';
  }

  private envSection(env: Record<string, string>): string[] {
    const entries = Object.entries(env).map(([key, value]) => `${key}=${formatEnvValue(value)}`);
    if (entries.length === 0) {
      return [];
    }

    return entries.map((entry, index) => {
      const prefix = index === 0 ? 'ENV ' : '    ';
      const suffix = index === entries.length - 1 ? '' : ' \\';
      return `${prefix}${entry}${suffix}`;
    });
  }

  private systemPackagesSection(packages: string[]): string[] {
    if (packages.length === 0) {
      return [];
    }

    return [
      'RUN apt-get update && \\',
      `    apt-get install -y --no-install-recommends ${packages.join(' ')} && \\`,
      '    rm -rf /var/lib/apt/lists/*'
    ];
  }

  private pythonSection(recipe: ImageRecipe): string[] {
    const lines: string[] = [];
    if (recipe.requirementsFile) {
      lines.push(`RUN ${PIP_INSTALL} -r ${recipe.requirementsFile}`);
    }
    if (recipe.pythonPackages.length > 0) {
      lines.push(`RUN ${PIP_INSTALL} ${recipe.pythonPackages.join(' ')}`);
    }
    return lines;
  }

  // Each optional package gets its own layer so one failure cannot mask another.
  private optionalPackagesSection(packages: string[]): string[] {
    if (packages.length === 0) {
      return [];
    }

    return [
      '# Optional performance packages; a failed install does not stop the build',
      ...packages.map(pkg =>
        `RUN ${PIP_INSTALL} ${pkg} || echo "WARNING: optional package ${pkg} failed to install, continuing"`
      )
    ];
  }
}

function formatEnvValue(value: string): string {
  if (value !== '' && /^[^\s"'\\$]+$/.test(value)) {
    return value;
  }
  return `"${value.replace(/(["\\$])/g, '\\$1')}"`;
}
