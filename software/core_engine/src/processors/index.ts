/**
 * Processors Module
 *
 * Bit collection, HRV correlation and session orchestration.
 *
 * @module processors
 *
 * Components:
 * - BitStreamCollector: Produces bits into baseline/experiment buffers, markers, live stats
 * - CorrelationRecorder: Stamps HRV samples with the experiment bit index
 * - GroupSession: Participant names and roles per device address
 * - SessionCoordinator: Wires entropy, DRBG, collector, monitor and recorder together
 *
 * @example
 * ```typescript
 * import { SessionCoordinator } from './processors';
 *
 * const session = new SessionCoordinator({ transport });
 * await session.seedGenerator();
 * session.startSession('baseline');
 * // ...
 * session.startSession('experiment');
 * const { stats, comparison } = session.poll();
 * ```
 */

// ============================================================================
// Bit Collection
// ============================================================================

export {
  BitStreamCollector,
  type CollectorConfig,
  type CollectorSources,
  type CollectorSnapshot,
  type BitBlockProvider,
  type ProducerKind,
  type ImportResult,
} from './BitStreamCollector';

// ============================================================================
// Correlation
// ============================================================================

export {
  CorrelationRecorder,
  type RecorderConfig,
  type BitIndexSource,
  type DeviceCorrelationSummary,
} from './CorrelationRecorder';

export {
  GroupSession,
  type Participant,
  type ParticipantRole,
  type GroupSessionInfo,
} from './GroupSession';

// ============================================================================
// Session Orchestration
// ============================================================================

export {
  SessionCoordinator,
  type SessionConfig,
  type SessionHardware,
  type SessionExport,
  type PollResult,
  type SeedReport,
} from './SessionCoordinator';
