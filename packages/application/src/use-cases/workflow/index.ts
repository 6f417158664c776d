export * from './WorkflowOrchestrator.js';
export * from './WorkflowScheduler.js';
export * from './LeadWorkflowService.js';
