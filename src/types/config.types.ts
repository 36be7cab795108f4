// src/types/config.types.ts

export interface LoggingProfile {
  appendTimestamp: boolean;
  timestampFormat: string;
  logLevel: string;
  enableWarningLog: boolean;
  logDirectory: string;
}

export interface LoggingConfig {
  profile?: string;
  profiles?: { [key: string]: LoggingProfile };
  appendTimestamp?: boolean;
  timestampFormat?: string;
  logLevel?: string;
  enableWarningLog?: boolean;
  logDirectory?: string;
}

export interface DownloaderEnvironment {
  sourceUrl: string;
  chromePath?: string;
  lftpPath: string;
  pageSettleMs: number;
}
