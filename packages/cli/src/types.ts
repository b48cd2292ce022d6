export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  logFile?: string;
  yes?: boolean;
  nonInteractive?: boolean;
};
