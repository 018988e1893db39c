export { TriageCommander, type CommanderOptions, type RunOptions } from './commander.js';
export { buildDispatchPayload, buildMedicalPayload, COMMANDER_NAME, MEDICAL_RESTRICTIONS, RULES_CHECKED } from './payload.js';
export { applyCorrection, blockedMessage, buildCorrectionRequest, isReflectionEligible, MAX_REFLECTION_ATTEMPTS } from './reflection.js';
