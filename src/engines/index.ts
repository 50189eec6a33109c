export { DocumentAssembler, type DocumentAssemblerDependencies } from './document.assembler.js';
export { PipelineEngine, type PipelineEngineDependencies } from './pipeline.engine.js';
