import type { HistoricIncident, HistoricIncidentQuery } from '../engine/types.js';
import { converters } from '../query/converters.js';
import { defineQueryType } from '../query/define-query.js';
import type { ParameterTable, SortTable } from '../query/types.js';

/**
 * Filter values accepted by the historic incident query
 */
export interface HistoricIncidentFilters {
  incidentId: string;
  incidentType: string;
  incidentMessage: string;
  processDefinitionId: string;
  processInstanceId: string;
  executionId: string;
  activityId: string;
  causeIncidentId: string;
  rootCauseIncidentId: string;
  configuration: string;
  open: boolean;
  resolved: boolean;
  deleted: boolean;
  tenantIds: string[];
  jobDefinitionIds: string[];
}

export type HistoricIncidentSortField =
  | 'incidentId'
  | 'incidentMessage'
  | 'createTime'
  | 'endTime'
  | 'incidentType'
  | 'executionId'
  | 'activityId'
  | 'processInstanceId'
  | 'processDefinitionId'
  | 'causeIncidentId'
  | 'rootCauseIncidentId'
  | 'configuration'
  | 'tenantId'
  | 'incidentState';

export interface HistoricIncidentDto {
  id: string;
  processDefinitionKey: string | null;
  processDefinitionId: string | null;
  processInstanceId: string | null;
  executionId: string | null;
  createTime: string;
  endTime: string | null;
  incidentType: string;
  activityId: string | null;
  causeIncidentId: string | null;
  rootCauseIncidentId: string | null;
  configuration: string | null;
  incidentMessage: string | null;
  tenantId: string | null;
  jobDefinitionId: string | null;
  open: boolean;
  deleted: boolean;
  resolved: boolean;
}

const parameters: ParameterTable<HistoricIncidentFilters> = {
  incidentId: { converter: converters.string },
  incidentType: { converter: converters.string },
  incidentMessage: { converter: converters.string },
  processDefinitionId: { converter: converters.string },
  processInstanceId: { converter: converters.string },
  executionId: { converter: converters.string },
  activityId: { converter: converters.string },
  causeIncidentId: { converter: converters.string },
  rootCauseIncidentId: { converter: converters.string },
  configuration: { converter: converters.string },
  open: { converter: converters.boolean },
  resolved: { converter: converters.boolean },
  deleted: { converter: converters.boolean },
  tenantIds: { name: 'tenantIdIn', converter: converters.stringList },
  jobDefinitionIds: { name: 'jobDefinitionIdIn', converter: converters.stringList },
};

const sorting: SortTable<HistoricIncidentQuery, HistoricIncidentSortField> = {
  incidentId: (query) => query.orderByIncidentId(),
  incidentMessage: (query) => query.orderByIncidentMessage(),
  createTime: (query) => query.orderByCreateTime(),
  endTime: (query) => query.orderByEndTime(),
  incidentType: (query) => query.orderByIncidentType(),
  executionId: (query) => query.orderByExecutionId(),
  activityId: (query) => query.orderByActivityId(),
  processInstanceId: (query) => query.orderByProcessInstanceId(),
  processDefinitionId: (query) => query.orderByProcessDefinitionId(),
  causeIncidentId: (query) => query.orderByCauseIncidentId(),
  rootCauseIncidentId: (query) => query.orderByRootCauseIncidentId(),
  configuration: (query) => query.orderByConfiguration(),
  tenantId: (query) => query.orderByTenantId(),
  incidentState: (query) => query.orderByIncidentState(),
};

export function toHistoricIncidentDto(incident: HistoricIncident): HistoricIncidentDto {
  return {
    id: incident.id,
    processDefinitionKey: incident.processDefinitionKey ?? null,
    processDefinitionId: incident.processDefinitionId ?? null,
    processInstanceId: incident.processInstanceId ?? null,
    executionId: incident.executionId ?? null,
    createTime: incident.createTime.toISOString(),
    endTime: incident.endTime?.toISOString() ?? null,
    incidentType: incident.incidentType,
    activityId: incident.activityId ?? null,
    causeIncidentId: incident.causeIncidentId ?? null,
    rootCauseIncidentId: incident.rootCauseIncidentId ?? null,
    configuration: incident.configuration ?? null,
    incidentMessage: incident.incidentMessage ?? null,
    tenantId: incident.tenantId ?? null,
    jobDefinitionId: incident.jobDefinitionId ?? null,
    open: incident.open,
    deleted: incident.deleted,
    resolved: incident.resolved,
  };
}

/**
 * Search over historic incidents.
 *
 * `open`, `resolved` and `deleted` are marker filters: only `true` applies
 * them, `false` is the same as leaving them out.
 */
export const historicIncidentQuery = defineQueryType({
  name: 'historic-incident',
  path: 'history/incident',
  parameters,
  sorting,
  createQuery: (engine) => engine.historyService.createHistoricIncidentQuery(),
  applyFilters: (query, filters) => {
    if (filters.incidentId !== undefined) query.incidentId(filters.incidentId);
    if (filters.incidentType !== undefined) query.incidentType(filters.incidentType);
    if (filters.incidentMessage !== undefined) query.incidentMessage(filters.incidentMessage);
    if (filters.processDefinitionId !== undefined) {
      query.processDefinitionId(filters.processDefinitionId);
    }
    if (filters.processInstanceId !== undefined) {
      query.processInstanceId(filters.processInstanceId);
    }
    if (filters.executionId !== undefined) query.executionId(filters.executionId);
    if (filters.activityId !== undefined) query.activityId(filters.activityId);
    if (filters.causeIncidentId !== undefined) query.causeIncidentId(filters.causeIncidentId);
    if (filters.rootCauseIncidentId !== undefined) {
      query.rootCauseIncidentId(filters.rootCauseIncidentId);
    }
    if (filters.configuration !== undefined) query.configuration(filters.configuration);
    if (filters.open === true) query.open();
    if (filters.resolved === true) query.resolved();
    if (filters.deleted === true) query.deleted();
    if (filters.tenantIds !== undefined && filters.tenantIds.length > 0) {
      query.tenantIdIn(...filters.tenantIds);
    }
    if (filters.jobDefinitionIds !== undefined && filters.jobDefinitionIds.length > 0) {
      query.jobDefinitionIdIn(...filters.jobDefinitionIds);
    }
  },
  toDto: toHistoricIncidentDto,
});
