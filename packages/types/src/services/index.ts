/**
 * Service interface exports
 *
 * Collaborator contracts that can be implemented by the chess rules
 * adapter, gRPC clients, database clients or mocks.
 */

export type {
  RulesCapability,
  FenRulesCapability,
  ProbeCapability,
  StatsStore,
} from '@tbx/core';
