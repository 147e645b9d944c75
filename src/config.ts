import { config as devConfig } from './config/dev';
import { config as uatConfig } from './config/uat';
import { config as prodConfig } from './config/prod';
import { config as testConfig } from './config/test';
import { Config } from './config/types';

const environment = process.env.NODE_ENV || 'development';

let config: Config;

switch (environment) {
  case 'production':
    config = prodConfig;
    break;
  case 'uat':
    config = uatConfig;
    break;
  case 'test':
    config = testConfig;
    break;
  default:
    config = devConfig;
    break;
}

export default config;
