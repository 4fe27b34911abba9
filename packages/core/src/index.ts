export {
  ProcurementEngine,
  type EngineLoadReport,
  type EngineSnapshot,
  type EngineTickResult,
  type ProcurementEngineOptions,
} from './engine.js';
export {
  SearchScheduler,
  type CancelResult,
  type InspectionResult,
  type PurchaseResult,
  type SchedulerClock,
  type SearchRequest,
  type SearchSchedulerOptions,
  type SubmitResult,
  type TickSummary,
} from './search-scheduler.js';
export {
  DiscoveryGate,
  createInitialGateState,
  type AcceptResult,
  type DeclineResult,
  type DiscoveryGateOptions,
  type DiscoveryGateState,
  type DiscoveryLoadReport,
  type DiscoveryStatus,
  type PrerequisiteCheck,
  type PrerequisiteReason,
  type PrerequisiteRequirement,
  type PrerequisiteStatus,
} from './discovery-gate.js';
export {
  SearchRecord,
  type CompletionCheck,
  type ItemReference,
  type SearchRecordParams,
  type SearchRecordSnapshot,
  type SearchStatus,
} from './search-record.js';
export {
  createListing,
  formatListingId,
  formatSearchId,
  isHeldOnDay,
  isOnHold,
  listingFromPersisted,
  listingToPersisted,
  readListing,
  viewListing,
  writeListing,
  type InspectionState,
  type Listing,
  type ListingInspection,
  type ListingView,
  type ListingStatus,
  type ListingTerms,
} from './listing.js';
export {
  computeEffectiveSuccess,
  computeSearchCost,
  resolveOutcome,
  resolveOutcomeById,
  type OutcomeConfig,
  type OutcomeRequest,
  type RequestedConfigurations,
  type ResolvedConfiguration,
  type ResolvedFind,
  type SearchOutcome,
  type SearchOutcomeKind,
} from './outcome-resolver.js';
export {
  TierCatalog,
  computeInspectionCost,
  createTierCatalog,
  type CreditBandResolution,
  type DiscoveryGateDefinition,
  type InspectionTier,
  type QualityTier,
  type SearchTier,
  type TierCatalogOptions,
} from './tier-catalog.js';
export {
  STATISTIC_KEYS,
  StatisticsBook,
  createEmptyStatistics,
  type ConsumerStatistics,
  type StatisticKey,
} from './statistics.js';
export {
  InMemoryLedger,
  type AcquisitionProvider,
  type AcquisitionResult,
  type InMemoryLedgerOptions,
  type Ledger,
  type LedgerChargeResult,
  type LedgerOperation,
  type LedgerOperationKind,
  type PrerequisiteProvider,
  type RatingProvider,
} from './collaborators.js';
export {
  ProcurementEventBus,
  isProcurementEventOfType,
  type EventSubscription,
  type ProcurementEvent,
  type ProcurementEventHandler,
  type ProcurementEventOf,
  type ProcurementEventPayloadMap,
  type ProcurementEventPublisher,
  type ProcurementEventType,
} from './events/procurement-events.js';
export {
  AttributeRecordBuilder,
  AttributeRecordReader,
  IndexedAttributeReader,
  indexedKey,
  type AttributeEntries,
  type AttributeRecord,
  type AttributeValue,
} from './persistence/attribute-record.js';
export {
  decodeSchedulerState,
  statisticsToPersisted,
  type DecodedSchedulerState,
  type LoadReport,
  type SchedulerSnapshot,
} from './persistence/search-persistence.js';
export {
  discoveryStateFromPersisted,
  discoveryStateToPersisted,
  type DiscoverySnapshot,
} from './persistence/discovery-persistence.js';
export {
  assertSchemaVersion,
  decodeEntries,
  type SkippedRecord,
  type SkippedRecordKind,
} from './persistence/decode-entries.js';
export {
  WireReadError,
  WireReader,
  WireWriter,
  type WireWriterOptions,
} from './replication/wire-stream.js';
export {
  readConsumerView,
  readDiscoveryState,
  writeConsumerView,
  writeDiscoveryState,
  type ConsumerView,
  type ReplicatedDiscoveryState,
} from './replication/codecs.js';
export {
  ConfigurationError,
  CorruptRecordError,
  ProcurementError,
  createOperationFailure,
  type OperationError,
  type OperationErrorCode,
  type OperationFailure,
  type ProcurementErrorCode,
} from './errors.js';
export {
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from './config.js';
export {
  createSeededRandom,
  createSequenceRandom,
  createUnseededRandom,
  randomBetween,
  randomInt,
  type RandomSource,
  type SeededRandom,
} from './rng.js';
export {
  createConsoleTelemetry,
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
  type ConsoleTelemetryOptions,
  type RecordedTelemetryEvent,
  type RecordedTelemetryLevel,
  type RecordingTelemetryFacade,
  type TelemetryEventData,
  type TelemetryFacade,
} from './telemetry.js';
export { PERSISTENCE_SCHEMA_VERSION, RUNTIME_VERSION } from './version.js';
