export const APP_NAME = 'pass-credential-helper';

/** Name of the mapping file inside the XDG config directory. */
export const MAPPING_FILE_NAME = 'git-pass-mapping.ini';

/** Name of the INI section whose keys every other section inherits. */
export const DEFAULT_SECTION = 'DEFAULT';

export const SKIP_ENV_VAR = 'PASS_CREDENTIAL_HELPER_SKIP';
export const PASS_BIN_ENV_VAR = 'PASS_CREDENTIAL_HELPER_PASS_BIN';
export const PASSWORD_STORE_DIR_ENV_VAR = 'PASSWORD_STORE_DIR';

export const DEFAULT_PASSWORD_STORE_DIR = '~/.password-store';
export const DEFAULT_ENCODING = 'UTF-8';
