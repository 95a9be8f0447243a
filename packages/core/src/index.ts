// Domain types
export type { AgentRef, AgentRecord } from './domain/agent/agent-ref.js';
export { AgentIndex, dedupeAgentRefs, rollupAgentsInvolved } from './domain/agent/agents-involved.js';

export type { EngineConfig } from './domain/config/engine-config.js';
export { DEFAULT_ENGINE_CONFIG } from './domain/config/engine-config.js';

export type { Attachment } from './domain/message/attachment.js';
export { mergeAttachments } from './domain/message/attachment.js';
export type { Feedback, FeedbackRating, FeedbackRecord, Reaction } from './domain/message/feedback.js';
export { ratingToReaction } from './domain/message/feedback.js';
export type { LocalMessage, MessageRole } from './domain/message/local-message.js';
export { MESSAGE_ROLES, isMessageRole } from './domain/message/local-message.js';
export type { CanonicalMessage, MessageStatus } from './domain/message/canonical-message.js';

export type { RunEvent, RunRecord, RunStatus, ParsedRunLog } from './domain/run/run-record.js';
export { parseRunLog, parseRunRecord, normalizeRunStatus } from './domain/run/run-record.js';
export type { RunSummary } from './domain/run/run-summary.js';
export { toEpochMs, toIsoTimestamp } from './domain/run/timestamps.js';

export type { StreamMarker } from './domain/stream/stream-marker.js';
export {
  STREAM_MARKER_KEY_PREFIX,
  STREAM_MARKER_TTL_MS,
  formatStreamMarkerValue,
  parseStreamMarkerValue,
  streamMarkerKey,
} from './domain/stream/stream-marker.js';

export { formatContent, normalizeContent, contentPrefix, contentSignature } from './domain/transcript/content.js';
export { deriveMessageId, derivePlaceholderId } from './domain/transcript/identity.js';
export type { MessageIdentityInput } from './domain/transcript/identity.js';
export { normalizeRunLog } from './domain/transcript/normalizer.js';
export type { NormalizedRunLog } from './domain/transcript/normalizer.js';
export { scoreMatch, DEFAULT_MATCH_THRESHOLDS } from './domain/transcript/matching.js';
export type { MatchKind, MatchScore, MatchSubject, MatchThresholds } from './domain/transcript/matching.js';
export { matchLedger } from './domain/transcript/ledger-matcher.js';
export type { LedgerMatchOptions, LedgerMatchResult, StaleLocalPolicy } from './domain/transcript/ledger-matcher.js';
export { dedupe } from './domain/transcript/dedup.js';
export type { ContainmentScope, DedupOptions, DedupResult } from './domain/transcript/dedup.js';
export { applyStreamingOverlay, isMarkerActive } from './domain/transcript/streaming-overlay.js';
export { paginate, clampLimit, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from './domain/transcript/paginator.js';
export type { Page, PageRequest } from './domain/transcript/paginator.js';

// Port interfaces
export type { RunLogProvider } from './ports/run-log-provider.js';
export type { LedgerStore, NewLocalMessage } from './ports/ledger-store.js';
export type { AgentDirectory } from './ports/agent-directory.js';
export type { AttachmentIndex } from './ports/attachment-index.js';
export type { FeedbackStore } from './ports/feedback-store.js';
export type { StreamMarkerStore } from './ports/stream-marker-store.js';
export type { KeyValueStore } from './ports/key-value-store.js';
export type { ConfigStore, EnginePrefs } from './ports/config-store.js';
export type { SecretStore } from './ports/secret-store.js';

// Adapters
export { HttpRunLogProvider } from './adapters/http-run-log-provider.js';
export type { HttpRunLogProviderOptions, FetchLike } from './adapters/http-run-log-provider.js';
export { JsonRunLogProvider } from './adapters/json-run-log-provider.js';
export { MemoryKeyValueStore } from './adapters/memory-key-value-store.js';
export { KvStreamMarkerStore } from './adapters/kv-stream-marker-store.js';
export { JsonConfigStore } from './adapters/json-config-store.js';
export { PlaintextSecretStore } from './adapters/plaintext-secret-store.js';
export { openDatabase } from './adapters/sqlite/database.js';
export type { SqliteDatabase } from './adapters/sqlite/database.js';
export { SqliteLedgerStore } from './adapters/sqlite/sqlite-ledger-store.js';
export { SqliteAttachmentIndex } from './adapters/sqlite/sqlite-attachment-index.js';
export type { StoredAttachment } from './adapters/sqlite/sqlite-attachment-index.js';
export { SqliteFeedbackStore } from './adapters/sqlite/sqlite-feedback-store.js';
export type { NewFeedback } from './adapters/sqlite/sqlite-feedback-store.js';
export { SqliteAgentDirectory } from './adapters/sqlite/sqlite-agent-directory.js';
export { SqliteKeyValueStore } from './adapters/sqlite/sqlite-key-value-store.js';

// Application services
export { TranscriptService } from './services/transcript-service.js';
export type { TranscriptDeps, ReconcileRequest, TranscriptPage } from './services/transcript-service.js';
export { EnrichmentService } from './services/enrichment-service.js';
export type { EnrichmentDeps, EnrichmentInput, EnrichmentResult } from './services/enrichment-service.js';
export { MessageLedgerService } from './services/message-ledger-service.js';
export type { RecordMessageInput } from './services/message-ledger-service.js';
export { ConfigService, ENV_KEYS } from './services/config-service.js';
export type { ConfigUpdate } from './services/config-service.js';

// Shared
export { createLogger, setLogLevel, getLogLevel, isLogLevel } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
export { ThreadmergeError, ConfigError, UpstreamError, RecordParseError } from './shared/errors.js';
export { systemClock, fixedClock } from './shared/clock.js';
export type { Clock } from './shared/clock.js';
export { TtlCache } from './shared/ttl-cache.js';
export type { TtlCacheOptions, TtlCacheStats } from './shared/ttl-cache.js';
