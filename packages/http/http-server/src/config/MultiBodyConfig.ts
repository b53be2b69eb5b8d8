/**
 * Configuration for the multi-body server.
 * Data-only structure, so a class.
 */
export class MultiBodyConfig {
    /** Run class-validator on parameters whose @MultiBody asks for it. */
    validationEnabled: boolean = true;

    /** Log every parameter binding. */
    loggingEnabled: boolean = false;

    constructor(init?: Partial<MultiBodyConfig>) {
        if (init?.validationEnabled !== undefined) {
            this.validationEnabled = init.validationEnabled;
        }
        if (init?.loggingEnabled !== undefined) {
            this.loggingEnabled = init.loggingEnabled;
        }
    }

    /**
     * Read MULTIBODY_VALIDATION and MULTIBODY_LOGGING ("true"/"false", "1"/"0").
     * Unset or unrecognised values keep the defaults.
     */
    static fromEnv(env: NodeJS.ProcessEnv = process.env): MultiBodyConfig {
        return new MultiBodyConfig({
            validationEnabled: parseFlag(env['MULTIBODY_VALIDATION']),
            loggingEnabled: parseFlag(env['MULTIBODY_LOGGING']),
        });
    }
}

function parseFlag(value: string | undefined): boolean | undefined {
    switch (value?.trim().toLowerCase()) {
        case 'true':
        case '1':
            return true;
        case 'false':
        case '0':
            return false;
        default:
            return undefined;
    }
}

/**
 * DI token for MultiBodyConfig injection.
 */
export const MULTIBODY_CONFIG_TOKEN = Symbol.for('MultiBodyConfig');
