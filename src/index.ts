/**
 * @file Public API.
 *
 * @module voxplan
 */

export * from './command/types.js';
export {
    command_decode,
    intent_create,
    intent_decode,
    intent_encode,
    plan_create,
    plan_decode,
    clarify_create,
    type IntentOptions
} from './command/schemas.js';
export { RuleMatcher } from './routing/RuleMatcher.js';
export { ruleTable_load, ruleTable_parse, type RuleTable } from './routing/rules.js';
export { SafetyEscalator } from './routing/SafetyEscalator.js';
export { PlanSplitter } from './routing/PlanSplitter.js';
export { PlanResolver, type ResolvedCommand, type ResolutionOrigin } from './routing/PlanResolver.js';
export { PromptAssembler } from './llm/PromptAssembler.js';
export { GenerativeParser, type GenerationResult, type GenerationFailure } from './llm/GenerativeParser.js';
export { AnthropicClient, OpenAIClient, generationClient_create } from './llm/clients/index.js';
export { GenerationError, type GenerationClient, type GenerationRequest } from './llm/types.js';
export { StepSequencer } from './execution/StepSequencer.js';
export { Verbalizer } from './execution/Verbalizer.js';
export { SimulatedActuator } from './execution/SimulatedActuator.js';
export { StepState, type Actuator, type ConfirmCallback, type SequenceReport } from './execution/types.js';
export { SettingsService, type ResolvedSettings } from './config/settings.js';
export { envFile_load, type EnvFileLoadResult } from './config/env.js';
export {
    replay_run,
    replayReport_passed,
    replaySuite_load,
    replaySuite_parse,
    slots_compare,
    type ReplayReport,
    type ReplaySuite
} from './eval/replay.js';
export { TelemetryBus } from './telemetry/TelemetryBus.js';
export { voxplan_assemble, type VoxPlanServiceBag } from './VoxPlanFactory.js';
