import { syntheticSpan } from '../ast/ast-factory.js';
import { SymTy } from '../typing/terms/sym-terms.js';
import {
    Binder, SymAggregate, SymAggregateStyle, SymFunction, SymFunctionSignature, SymGenericKind, SymModule, SymVariable
} from '../typing/terms/symbols.js';

export const PRELUDE_MODULE_NAME = 'prelude';

/**
 * Symbols every program can name without importing them.
 *
 * ```
 * struct Pointer[type T] { }
 * class String {
 *     fn literal(data: Pointer[u8], length: u32) -> String
 * }
 * ```
 *
 * String literals are checked as calls to `String.literal`.
 */
export class WellKnownSymbols {
    readonly module: SymModule;
    readonly pointerStruct: SymAggregate;
    readonly stringClass: SymAggregate;
    readonly stringLiteralFn: SymFunction;

    constructor() {
        const span = syntheticSpan();
        this.module = new SymModule(PRELUDE_MODULE_NAME, span);

        const pointee = new SymVariable(SymGenericKind.Type, 'T', span);
        this.pointerStruct = new SymAggregate('Pointer', SymAggregateStyle.Struct, [pointee], span);

        this.stringClass = new SymAggregate('String', SymAggregateStyle.Class, [], span);
        this.stringLiteralFn = this.stringClass.addFunction(
            new SymFunction('literal', span, false, () => this.stringLiteralSignature())
        );

        this.module
            .add(this.pointerStruct.name, this.pointerStruct)
            .add(this.stringClass.name, this.stringClass);
    }

    stringTy(): SymTy {
        return SymTy.aggregate(this.stringClass);
    }

    /** `Pointer[element]` */
    pointerTy(element: SymTy): SymTy {
        return SymTy.aggregate(this.pointerStruct, [element]);
    }

    private stringLiteralSignature(): SymFunctionSignature {
        const span = this.stringLiteralFn.nameSpan;
        const data = new SymVariable(SymGenericKind.Place, 'data', span);
        const length = new SymVariable(SymGenericKind.Place, 'length', span);
        return {
            symbols: { genericVariables: [], inputVariables: [data, length] },
            inputOutput: new Binder([], new Binder([data, length], {
                inputTys: [this.pointerTy(SymTy.u8()), SymTy.u32()],
                outputTy: this.stringTy(),
                whereClauses: [],
            })),
        };
    }
}
