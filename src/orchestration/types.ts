// Orchestration-specific types
export interface DeployOptions {
  /** Env file to load; `.env.runpod` by default */
  envFile?: string;
  /** Working directory the deployment program runs in */
  cwd?: string;
}
