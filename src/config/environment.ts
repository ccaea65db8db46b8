import { ConfigModule, ConfigModuleOptions } from '@nestjs/config';
import { ConfigValidation, configValidationSchema } from './config.validation';

export const ENV_FILE_PATHS = ['.env.local', '.env'];

export function envConfigOptions(
    envFilePath: string[] = ENV_FILE_PATHS,
): ConfigModuleOptions {
    return {
        isGlobal: true,
        validationSchema: configValidationSchema,
        validationOptions: {
            abortEarly: true,
        },
        envFilePath,
    };
}

/**
 * Merge the env files into process.env and return the validated environment.
 * The settings path and the log level are needed before the Nest app exists.
 */
export async function loadEnvironment(
    envFilePath: string[] = ENV_FILE_PATHS,
): Promise<ConfigValidation> {
    await ConfigModule.forRoot(envConfigOptions(envFilePath));

    const result = configValidationSchema.validate(process.env, {
        abortEarly: true,
        allowUnknown: true,
    });
    if (result.error !== undefined) {
        throw new Error(`Invalid environment: ${result.error.message}`);
    }
    return result.value;
}
