// packages/script/src/index.ts
export * from './op_code.js';
export * from './call_flags.js';
export * from './constants.js';
export * from './interop_service.js';
export * from './contract_parameter.js';
export * from './stack_item.js';
export * from './script_builder.js';
export * from './script_reader.js';
export * from './verification_script.js';
export * from './invocation_script.js';
