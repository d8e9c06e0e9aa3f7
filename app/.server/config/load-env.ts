// Side-effect import: must come before anything that reads process.env at load time (the logger does)
import { loadEnvFile } from '~/.server/config/env-file';

loadEnvFile(process.env.ENV_FILE?.trim() || undefined);
