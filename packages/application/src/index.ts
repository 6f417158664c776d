/**
 * @fileoverview Application Layer Package
 *
 * Hexagonal application layer for the lead workflow.
 *
 * This package contains:
 * - **Primary Ports**: what the application offers (intake, approvals, reporting)
 * - **Secondary Ports**: what it needs (scoring, outreach, scheduling, analytics, persistence)
 * - **Use Cases**: the WorkflowOrchestrator, the WorkflowScheduler and the LeadWorkflowService
 *
 * ## Architecture Overview
 *
 * ```
 *                    ┌─────────────────────────────────────────┐
 *                    │            APPLICATION LAYER            │
 *                    │                                         │
 *   ┌──────────┐     │  ┌─────────────┐    ┌──────────────┐   │     ┌──────────┐
 *   │   REST   │────▶│  │   Primary   │───▶│   Use Cases  │   │────▶│  Lead    │
 *   │  Routes  │     │  │    Ports    │    │              │   │     │  Store   │
 *   └──────────┘     │  └─────────────┘    └──────┬───────┘   │     └──────────┘
 *                    │                            │           │
 *   ┌──────────┐     │                            ▼           │     ┌──────────┐
 *   │Scheduler │────▶│                     ┌──────────────┐   │────▶│ Mail/LLM │
 *   │   loop   │     │                     │  Secondary   │   │     │ Calendar │
 *   └──────────┘     │                     │    Ports     │   │     └──────────┘
 *                    │                     └──────────────┘   │
 *                    └────────────────────────────────────────┘
 * ```
 *
 * @module @leadflow/application
 */

// ============================================================================
// PRIMARY PORTS (Driving Side)
// ============================================================================

export * from './ports/primary/index.js';

// ============================================================================
// SECONDARY PORTS (Driven Side)
// ============================================================================

export * from './ports/secondary/index.js';

// ============================================================================
// USE CASES
// ============================================================================

export * from './use-cases/index.js';

// ============================================================================
// SHARED TYPES & UTILITIES
// ============================================================================

export * from './shared/index.js';
