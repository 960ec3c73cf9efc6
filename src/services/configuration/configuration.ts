import { MalformedConfigurationError } from '@errors/malformedConfiguration.error';
import { MissingEnvVarError } from '@errors/missingEnvVar.error';
import { TradewardError } from '@errors/tradeward.error';
import type { Configuration as ConfigurationModel } from '@models/configuration.types';
import { load } from 'js-yaml';
import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CONFIG_FILE_PATH_ENV } from './configuration.const';
import { configurationSchema } from './configuration.schema';

export class Configuration {
  private configuration: ConfigurationModel;

  constructor(configFilePath = process.env[CONFIG_FILE_PATH_ENV]) {
    if (!configFilePath) throw new MissingEnvVarError(CONFIG_FILE_PATH_ENV);
    const isJson = configFilePath.endsWith('json') || configFilePath.endsWith('json5');
    const isYaml = configFilePath.endsWith('yml') || configFilePath.endsWith('yaml');
    if (!isJson && !isYaml)
      throw new TradewardError('configuration', `Unsupported configuration file format: ${configFilePath}`);

    const data = readFileSync(configFilePath, 'utf8');
    const raw: unknown = isJson ? JSON5.parse(data) : load(data);
    const result = configurationSchema.safeParse(raw);
    if (!result.success) throw new MalformedConfigurationError(z.prettifyError(result.error));
    this.configuration = result.data;
  }

  public getExchange() {
    return this.configuration.exchange;
  }

  public getTrading() {
    return this.configuration.trading;
  }

  public getTrailing() {
    return this.configuration.trailing;
  }

  public getRetry() {
    return this.configuration.retry;
  }

  public getJournal() {
    return this.configuration.journal;
  }
}
