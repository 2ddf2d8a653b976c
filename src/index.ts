export { Code, CodeHexSchema, codeFromHex, InvalidCodeHexError } from "./bytecode/Code";
export type { TrackedSlot } from "./bytecode/ConstantTracker";
export { ConstantTracker } from "./bytecode/ConstantTracker";
export type {
  ControlFlowValidatorOptions,
  ControlFlowValidatorService,
  ValidationReport,
} from "./bytecode/ControlFlowValidator";
export {
  analyzeCode,
  ControlFlowValidator,
  ControlFlowValidatorLive,
  ControlFlowValidatorTest,
  validateCode,
  walkCode,
} from "./bytecode/ControlFlowValidator";
export type {
  InstructionDescriptor,
  InstructionKind,
  InstructionTableService,
} from "./bytecode/InstructionTable";
export {
  decodeInstruction,
  InstructionTable,
  InstructionTableLive,
  InstructionTableTest,
  lookupInstruction,
  makeInstructionTable,
} from "./bytecode/InstructionTable";
export type { ValidationError } from "./bytecode/ValidationError";
export {
  CodeTruncatedError,
  formatValidationError,
  InvalidInstructionError,
  InvalidJumpDestinationError,
  StackOverflowError,
  StackUnderflowError,
  UnresolvedDynamicJumpError,
} from "./bytecode/ValidationError";
export type {
  CodeDeployerService,
  CodeDeploymentError,
  DeployedCode,
} from "./deploy/CodeDeployer";
export {
  CodeDeployer,
  CodeDeployerLive,
  CodeDeployerTest,
  CodeRejectedError,
  CodeSizeLimitExceededError,
  deployCode,
} from "./deploy/CodeDeployer";
export type { CodeStoreService } from "./deploy/CodeStore";
export {
  AddressHexSchema,
  CodeAlreadyDeployedError,
  CodeStore,
  CodeStoreMemory,
  CodeStoreTest,
  decodeAddress,
  InvalidAddressError,
} from "./deploy/CodeStore";
export type { HardforkName, ReleaseSpecService } from "./evm/ReleaseSpec";
export {
  HardforkNames,
  MAX_CODE_SIZE,
  ReleaseSpec,
  ReleaseSpecLive,
  STACK_LIMIT,
  toHardfork,
} from "./evm/ReleaseSpec";
