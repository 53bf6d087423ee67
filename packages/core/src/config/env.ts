/**
 * The host environment with `defaults` filled in where a variable is unset
 */
export function withEnvDefaults(
    base: NodeJS.ProcessEnv,
    defaults: Record<string, string>,
): Record<string, string> {
    const env: Record<string, string> = {};

    for (const [name, value] of Object.entries(base)) {
        if (value !== undefined) env[name] = value;
    }
    for (const [name, value] of Object.entries(defaults)) {
        if (env[name] === undefined) env[name] = value;
    }

    return env;
}
