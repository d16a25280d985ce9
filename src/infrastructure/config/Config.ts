export interface AppConfig {
  bank: {
    bic?: string;
    registryPath?: string;
  };
  server: {
    port: number;
  };
  logging: {
    level: 'debug' | 'info';
  };
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  return {
    bank: {
      bic: env.SPARDA_BANK_BIC || undefined,
      registryPath: env.BANK_REGISTRY_PATH || undefined,
    },
    server: {
      port: Number(env.PORT ?? 4000),
    },
    logging: {
      level: env.LOG_LEVEL === 'debug' ? 'debug' : 'info',
    },
  };
};
