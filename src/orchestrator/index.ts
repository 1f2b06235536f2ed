export {
  ChatTurnOrchestrator,
  type ChatTurnOrchestratorOptions,
  type TurnInput,
  type TurnOutcome,
  type TurnState
} from './turn.js';
