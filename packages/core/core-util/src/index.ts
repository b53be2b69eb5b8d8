/**
 * @multibody/core-util
 *
 * Utility functions shared by every multibody package.
 *
 * @packageDocumentation
 */

export { toError, describeJsonValue } from './lib/errorUtils';
