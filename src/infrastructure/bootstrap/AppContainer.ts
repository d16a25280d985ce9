import type { BankIdentifierPort } from '../../application/ports/BankIdentifierPort.js';
import { GermanBankRegistry } from '../adapters/banking/GermanBankRegistry.js';
import { IbanToolsBankIdentifierAdapter } from '../adapters/banking/IbanToolsBankIdentifierAdapter.js';
import { loadConfig, type AppConfig } from '../config/Config.js';
import { SpardaBankPlugin } from '../plugin/SpardaBankPlugin.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  bankIdentifiers?: BankIdentifierPort;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly bankIdentifiers: BankIdentifierPort;
  readonly plugin: SpardaBankPlugin;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.bankIdentifiers =
      overrides.bankIdentifiers ??
      new IbanToolsBankIdentifierAdapter(GermanBankRegistry.fromFile(this.config.bank.registryPath));

    this.plugin = new SpardaBankPlugin(this.bankIdentifiers, {
      bic: this.config.bank.bic,
      debug: this.config.logging.level === 'debug',
    });
  }

  hasBankConfigured(): boolean {
    return this.plugin.isConfigured();
  }
}
