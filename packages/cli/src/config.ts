import { type RenderOptions, renderOptionsFromEnv } from '@po-tools/parser';

export interface CliConfig {
  render: RenderOptions;
}

export function loadConfig(): CliConfig {
  return {
    render: renderOptionsFromEnv(process.env),
  };
}

let currentConfig: CliConfig | null = null;

export function getConfig(): CliConfig {
  if (!currentConfig) {
    currentConfig = loadConfig();
  }
  return currentConfig;
}
