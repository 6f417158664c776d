export { healthRoutes } from './health.js';
export { createApprovalRoutes } from './approvals.js';
export { createLeadRoutes } from './leads.js';
export { createReportRoutes } from './reports.js';
