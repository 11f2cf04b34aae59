/**
 * CLI Types
 */

export interface CheckOptions {
    /** Path to the account registry YAML file */
    accounts?: string;
}
