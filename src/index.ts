// Public library surface.

export { VERSION, TOOL_NAME } from './version';

export * from './errors';
export * from './ir/treeModel';
export * from './ir/writeTreeJson';
export * from './ir/deterministicJson';

export * from './extract/elab/elaboratedDesign';
export * from './extract/elab/topModule';
export * from './extract/elab/buildTree';
export * from './extract/hierarchyExtractor';

export * from './compare/architectureComparator';
export * from './compare/diffReport';

export * from './report/extractionReport';
export * from './report/hierarchyText';
export * from './report/dotExport';

export * from './scan/sourceScanner';
export * from './scan/inventory';
export * from './scan/resolveSourceFile';

export * from './config/repairConfig';
export * from './repair/chatClient';
export * from './repair/inferenceServices';
export * from './repair/commandTools';
export * from './repair/backup';
export * from './repair/validationLog';

export * from './core/extractHierarchyFromXml';
export * from './core/compareArchitectureFiles';
export * from './core/repairOrchestrator';
export * from './core/defaultCollaborators';
