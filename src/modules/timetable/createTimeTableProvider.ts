/**
 * @fileoverview Factory that dispatches a source configuration to its provider.
 * @module modules/timetable/createTimeTableProvider
 */

import { CalculationApiProvider } from './CalculationApiProvider';
import type { ITimeTableProvider } from './interfaces';
import { PortalProvider } from './PortalProvider';
import type { TimeTableSourceConfig } from './types';

/**
 * Build the provider for a source. Called once per configuration change.
 */
export function createTimeTableProvider(config: TimeTableSourceConfig): ITimeTableProvider {
    switch (config.type) {
        case 'calculation':
            return new CalculationApiProvider(config);
        case 'portal':
            return new PortalProvider(config);
    }
}
