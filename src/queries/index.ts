import type { AnyQueryType } from '../query/types.js';
import { historicIncidentQuery } from './historic-incident.query.js';
import { processInstanceQuery } from './process-instance.query.js';

export {
  type HistoricIncidentDto,
  type HistoricIncidentFilters,
  type HistoricIncidentSortField,
  historicIncidentQuery,
  toHistoricIncidentDto,
} from './historic-incident.query.js';
export {
  type ProcessInstanceDto,
  type ProcessInstanceFilters,
  type ProcessInstanceSortField,
  processInstanceQuery,
} from './process-instance.query.js';

/**
 * Query types served by default
 */
export const builtInQueryTypes: readonly AnyQueryType[] = [historicIncidentQuery, processInstanceQuery];
