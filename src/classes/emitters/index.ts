/**
 * Emitters - Exports
 */

export { emitImport } from './emitImport';
export { emitVariable, emitAlias, emitEnumValue } from './emitVariable';
export { emitReturn } from './emitReturn';
export { emitFuncDeclaration } from './emitFuncDeclaration';
export { emitFuncCall } from './emitFuncCall';
