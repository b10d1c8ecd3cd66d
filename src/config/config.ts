export interface AppConfig {
  fieldManager: string;
  outputDir: string;
  logsDir: string;
}

export const CONTROLLER_NAME = 'pod-security-admission-label-synchronization-controller';

export function getConfig(): AppConfig {
  return {
    fieldManager: process.env.PSA_TOOLS_FIELD_MANAGER || 'psa-label-sync-tools',
    outputDir: process.env.PSA_TOOLS_OUT_DIR || './out',
    logsDir: process.env.PSA_TOOLS_LOGS_DIR || '.',
  };
}

