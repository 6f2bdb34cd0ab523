export * from './perm-module.js';
export * from './ast/unchecked-ast.js';
export * from './ast/ast-factory.js';
export * from './builtins/prelude.js';
export * from './codes/errors.js';
export * from './config/checker-config.js';
export * from './logging/check-logger.js';
export * from './typing/report.js';
export * from './typing/or-else.js';
export * from './typing/env.js';
export * from './typing/universe.js';
export * from './typing/runtime/check-runtime.js';
export * from './typing/runtime/infer-var.js';
export * from './typing/terms/sym-terms.js';
export * from './typing/terms/symbols.js';
export * from './typing/terms/substitution.js';
export * from './typing/predicates/predicate.js';
export * from './typing/subtype/alternatives.js';
export * from './typing/subtype/red-ty.js';
export * from './typing/subtype/subtyping.js';
export * from './typing/checker/sym-expr.js';
export * from './typing/checker/name-resolution.js';
export * from './typing/checker/function-checker.js';
