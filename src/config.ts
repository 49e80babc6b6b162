import * as constants from './constants';

function parseBoolean(value: string | undefined): boolean {
  if (value == null) return false;
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    default:
      return false;
  }
}

/**
 * Library defaults. Environment values are read once, when this module is
 * first loaded.
 */
const config = {
  defaults: {
    vfsName: 'default',
    cacheMaxSize: 1000,
    caseSensitive: parseBoolean(
      process.env[constants.ENV_FORCE_CASE_SENSITIVE],
    ),
  },
};

export default config;

export { parseBoolean };
