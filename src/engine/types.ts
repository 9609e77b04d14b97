/**
 * Query engine surface consumed by query-binder.
 *
 * The engine itself (its filter semantics, persistence and execution) lives
 * outside this package. These interfaces describe only the calls the query
 * types make on it, so any engine client with a matching shape can be plugged in.
 *
 * @module engine/types
 */

/**
 * Terminal and direction operations shared by every engine query handle.
 *
 * Filter and ordering calls are synchronous and accumulate on the handle;
 * only the terminal operations reach the engine.
 */
export interface EngineQuery<TSelf, TResult> {
  /** Apply ascending direction to the most recent ordering call */
  asc(): TSelf;
  /** Apply descending direction to the most recent ordering call */
  desc(): TSelf;
  list(): Promise<TResult[]>;
  listPage(firstResult: number, maxResults: number): Promise<TResult[]>;
  count(): Promise<number>;
}

export interface HistoricIncident {
  id: string;
  processDefinitionKey?: string;
  processDefinitionId?: string;
  processInstanceId?: string;
  executionId?: string;
  createTime: Date;
  endTime?: Date;
  incidentType: string;
  activityId?: string;
  causeIncidentId?: string;
  rootCauseIncidentId?: string;
  configuration?: string;
  incidentMessage?: string;
  tenantId?: string;
  jobDefinitionId?: string;
  open: boolean;
  deleted: boolean;
  resolved: boolean;
}

export interface HistoricIncidentQuery
  extends EngineQuery<HistoricIncidentQuery, HistoricIncident> {
  incidentId(incidentId: string): HistoricIncidentQuery;
  incidentType(incidentType: string): HistoricIncidentQuery;
  incidentMessage(incidentMessage: string): HistoricIncidentQuery;
  processDefinitionId(processDefinitionId: string): HistoricIncidentQuery;
  processInstanceId(processInstanceId: string): HistoricIncidentQuery;
  executionId(executionId: string): HistoricIncidentQuery;
  activityId(activityId: string): HistoricIncidentQuery;
  causeIncidentId(causeIncidentId: string): HistoricIncidentQuery;
  rootCauseIncidentId(rootCauseIncidentId: string): HistoricIncidentQuery;
  configuration(configuration: string): HistoricIncidentQuery;
  tenantIdIn(...tenantIds: string[]): HistoricIncidentQuery;
  jobDefinitionIdIn(...jobDefinitionIds: string[]): HistoricIncidentQuery;
  open(): HistoricIncidentQuery;
  resolved(): HistoricIncidentQuery;
  deleted(): HistoricIncidentQuery;

  orderByIncidentId(): HistoricIncidentQuery;
  orderByIncidentMessage(): HistoricIncidentQuery;
  orderByCreateTime(): HistoricIncidentQuery;
  orderByEndTime(): HistoricIncidentQuery;
  orderByIncidentType(): HistoricIncidentQuery;
  orderByExecutionId(): HistoricIncidentQuery;
  orderByActivityId(): HistoricIncidentQuery;
  orderByProcessInstanceId(): HistoricIncidentQuery;
  orderByProcessDefinitionId(): HistoricIncidentQuery;
  orderByCauseIncidentId(): HistoricIncidentQuery;
  orderByRootCauseIncidentId(): HistoricIncidentQuery;
  orderByConfiguration(): HistoricIncidentQuery;
  orderByTenantId(): HistoricIncidentQuery;
  orderByIncidentState(): HistoricIncidentQuery;
}

export interface ProcessInstance {
  id: string;
  processDefinitionId: string;
  businessKey?: string;
  caseInstanceId?: string;
  tenantId?: string;
  ended: boolean;
  suspended: boolean;
}

export interface ProcessInstanceQuery
  extends EngineQuery<ProcessInstanceQuery, ProcessInstance> {
  processInstanceIds(processInstanceIds: string[]): ProcessInstanceQuery;
  processInstanceBusinessKey(businessKey: string): ProcessInstanceQuery;
  processInstanceBusinessKeyLike(businessKeyLike: string): ProcessInstanceQuery;
  processDefinitionId(processDefinitionId: string): ProcessInstanceQuery;
  processDefinitionKey(processDefinitionKey: string): ProcessInstanceQuery;
  processDefinitionKeyIn(...processDefinitionKeys: string[]): ProcessInstanceQuery;
  superProcessInstanceId(superProcessInstanceId: string): ProcessInstanceQuery;
  subProcessInstanceId(subProcessInstanceId: string): ProcessInstanceQuery;
  incidentId(incidentId: string): ProcessInstanceQuery;
  incidentType(incidentType: string): ProcessInstanceQuery;
  incidentMessage(incidentMessage: string): ProcessInstanceQuery;
  tenantIdIn(...tenantIds: string[]): ProcessInstanceQuery;
  activityIdIn(...activityIds: string[]): ProcessInstanceQuery;
  active(): ProcessInstanceQuery;
  suspended(): ProcessInstanceQuery;
  withIncident(): ProcessInstanceQuery;
  withoutTenantId(): ProcessInstanceQuery;
  rootProcessInstances(): ProcessInstanceQuery;

  orderByProcessInstanceId(): ProcessInstanceQuery;
  orderByProcessDefinitionKey(): ProcessInstanceQuery;
  orderByProcessDefinitionId(): ProcessInstanceQuery;
  orderByTenantId(): ProcessInstanceQuery;
  orderByBusinessKey(): ProcessInstanceQuery;
}

export interface HistoryService {
  createHistoricIncidentQuery(): HistoricIncidentQuery;
}

export interface RuntimeService {
  createProcessInstanceQuery(): ProcessInstanceQuery;
}

/**
 * Entry point into the query engine. Every call to a `create*Query` method
 * must return a fresh handle.
 */
export interface ProcessEngine {
  readonly historyService: HistoryService;
  readonly runtimeService: RuntimeService;
}
