/**
 * @fileoverview Primary Ports Index
 *
 * @module application/ports/primary
 */

export * from './LeadWorkflowUseCase.js';
