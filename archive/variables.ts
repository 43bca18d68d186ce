/**
 * Weather Archive - Variable Registry
 *
 * Maps the names accepted by aggregate queries onto record fields.
 */

import { UnrecognizedVariableError } from './errors';
import type { MeasurementField, VariableName } from './types';

export const VARIABLE_FIELDS: Readonly<Record<VariableName, MeasurementField>> = {
    tmax: 'maxTemp',
    tmin: 'minTemp',
    tmean: 'meanTemp',
    ppt: 'gasConcentration'
};

export const VARIABLE_NAMES: readonly VariableName[] = ['tmax', 'tmin', 'tmean', 'ppt'];

export function isVariableName(value: string): value is VariableName {
    return Object.prototype.hasOwnProperty.call(VARIABLE_FIELDS, value);
}

/**
 * Resolve a variable name to its record field.
 * Throws UnrecognizedVariableError for anything outside the registry.
 */
export function resolveVariable(name: string): MeasurementField {
    if (!isVariableName(name)) {
        throw new UnrecognizedVariableError(name);
    }
    return VARIABLE_FIELDS[name];
}
