import type { ProcessInstance, ProcessInstanceQuery } from '../engine/types.js';
import { converters } from '../query/converters.js';
import { defineQueryType } from '../query/define-query.js';
import type { ParameterTable, SortTable } from '../query/types.js';

export interface ProcessInstanceFilters {
  processInstanceIds: string[];
  businessKey: string;
  businessKeyLike: string;
  processDefinitionId: string;
  processDefinitionKey: string;
  processDefinitionKeys: string[];
  superProcessInstance: string;
  subProcessInstance: string;
  incidentId: string;
  incidentType: string;
  incidentMessage: string;
  tenantIds: string[];
  activityIds: string[];
  active: boolean;
  suspended: boolean;
  withIncident: boolean;
  withoutTenantId: boolean;
  rootProcessInstances: boolean;
}

export type ProcessInstanceSortField =
  | 'instanceId'
  | 'definitionKey'
  | 'definitionId'
  | 'tenantId'
  | 'businessKey';

export interface ProcessInstanceDto {
  id: string;
  definitionId: string;
  businessKey: string | null;
  caseInstanceId: string | null;
  tenantId: string | null;
  ended: boolean;
  suspended: boolean;
}

const parameters: ParameterTable<ProcessInstanceFilters> = {
  processInstanceIds: { converter: converters.stringList },
  businessKey: { converter: converters.string },
  businessKeyLike: { converter: converters.string },
  processDefinitionId: { converter: converters.string },
  processDefinitionKey: { converter: converters.string },
  processDefinitionKeys: { name: 'processDefinitionKeyIn', converter: converters.stringList },
  superProcessInstance: { converter: converters.string },
  subProcessInstance: { converter: converters.string },
  incidentId: { converter: converters.string },
  incidentType: { converter: converters.string },
  incidentMessage: { converter: converters.string },
  tenantIds: { name: 'tenantIdIn', converter: converters.stringList },
  activityIds: { name: 'activityIdIn', converter: converters.stringList },
  active: { converter: converters.boolean },
  suspended: { converter: converters.boolean },
  withIncident: { converter: converters.boolean },
  withoutTenantId: { converter: converters.boolean },
  rootProcessInstances: { converter: converters.boolean },
};

const sorting: SortTable<ProcessInstanceQuery, ProcessInstanceSortField> = {
  instanceId: (query) => query.orderByProcessInstanceId(),
  definitionKey: (query) => query.orderByProcessDefinitionKey(),
  definitionId: (query) => query.orderByProcessDefinitionId(),
  tenantId: (query) => query.orderByTenantId(),
  businessKey: (query) => query.orderByBusinessKey(),
};

function applyListFilter(values: string[] | undefined, apply: (values: string[]) => unknown): void {
  if (values !== undefined && values.length > 0) {
    apply(values);
  }
}

/**
 * Search over running process instances.
 */
export const processInstanceQuery = defineQueryType({
  name: 'process-instance',
  path: 'process-instance',
  parameters,
  sorting,
  createQuery: (engine) => engine.runtimeService.createProcessInstanceQuery(),
  applyFilters: (query, filters) => {
    applyListFilter(filters.processInstanceIds, (ids) => query.processInstanceIds(ids));
    if (filters.businessKey !== undefined) query.processInstanceBusinessKey(filters.businessKey);
    if (filters.businessKeyLike !== undefined) {
      query.processInstanceBusinessKeyLike(filters.businessKeyLike);
    }
    if (filters.processDefinitionId !== undefined) {
      query.processDefinitionId(filters.processDefinitionId);
    }
    if (filters.processDefinitionKey !== undefined) {
      query.processDefinitionKey(filters.processDefinitionKey);
    }
    applyListFilter(filters.processDefinitionKeys, (keys) => query.processDefinitionKeyIn(...keys));
    if (filters.superProcessInstance !== undefined) {
      query.superProcessInstanceId(filters.superProcessInstance);
    }
    if (filters.subProcessInstance !== undefined) {
      query.subProcessInstanceId(filters.subProcessInstance);
    }
    if (filters.incidentId !== undefined) query.incidentId(filters.incidentId);
    if (filters.incidentType !== undefined) query.incidentType(filters.incidentType);
    if (filters.incidentMessage !== undefined) query.incidentMessage(filters.incidentMessage);
    applyListFilter(filters.tenantIds, (ids) => query.tenantIdIn(...ids));
    applyListFilter(filters.activityIds, (ids) => query.activityIdIn(...ids));
    if (filters.active === true) query.active();
    if (filters.suspended === true) query.suspended();
    if (filters.withIncident === true) query.withIncident();
    if (filters.withoutTenantId === true) query.withoutTenantId();
    if (filters.rootProcessInstances === true) query.rootProcessInstances();
  },
  toDto: (instance: ProcessInstance): ProcessInstanceDto => ({
    id: instance.id,
    definitionId: instance.processDefinitionId,
    businessKey: instance.businessKey ?? null,
    caseInstanceId: instance.caseInstanceId ?? null,
    tenantId: instance.tenantId ?? null,
    ended: instance.ended,
    suspended: instance.suspended,
  }),
});
