import { inject, type Module } from 'langium';
import { WellKnownSymbols } from './builtins/prelude.js';
import { CheckerConfig, DEFAULT_CHECKER_CONFIG } from './config/checker-config.js';
import { CheckLogger } from './logging/check-logger.js';
import { Blocks } from './typing/checker/block-checker.js';
import { Calls } from './typing/checker/calls.js';
import { Exprs } from './typing/checker/exprs.js';
import { Functions } from './typing/checker/function-checker.js';
import { MemberLookup } from './typing/checker/member-lookup.js';
import { PlaceTyper } from './typing/checker/places.js';
import { Types } from './typing/checker/type-checker.js';
import { CopyPredicates } from './typing/predicates/copy-predicates.js';
import { MovePredicates } from './typing/predicates/move-predicates.js';
import { OwnershipPredicates } from './typing/predicates/ownership-predicates.js';
import { PermPredicates } from './typing/predicates/perm-predicates.js';
import { VarInferFacts } from './typing/predicates/var-infer.js';
import { Futures } from './typing/subtype/is-future.js';
import { Numerics } from './typing/subtype/is-numeric.js';
import { RedTys } from './typing/subtype/red-ty.js';
import { PermSubtyping } from './typing/subtype/subtyping.js';

/**
 * Services of the permission checker, grouped by concern.
 */
export type PermServices = {
    config: CheckerConfig,
    logging: {
        Logger: CheckLogger
    },
    terms: {
        WellKnown: WellKnownSymbols
    },
    predicates: {
        Copy: CopyPredicates,
        Move: MovePredicates,
        Ownership: OwnershipPredicates,
        Predicates: PermPredicates,
        VarInfer: VarInferFacts
    },
    subtyping: {
        RedTys: RedTys,
        Subtyping: PermSubtyping,
        Futures: Futures,
        Numerics: Numerics
    },
    checking: {
        Places: PlaceTyper,
        MemberLookup: MemberLookup,
        Types: Types,
        Exprs: Exprs,
        Calls: Calls,
        Blocks: Blocks,
        Functions: Functions
    }
}

/**
 * Dependency injection module binding every service to its implementation.
 * Services reach each other lazily, so cycles such as predicates and
 * subtyping are fine.
 */
export function createPermModule(config: CheckerConfig): Module<PermServices, PermServices> {
    return {
        config: () => config,
        logging: {
            Logger: (services) => new CheckLogger(services)
        },
        terms: {
            WellKnown: () => new WellKnownSymbols()
        },
        predicates: {
            Copy: (services) => new CopyPredicates(services),
            Move: (services) => new MovePredicates(services),
            Ownership: (services) => new OwnershipPredicates(services),
            Predicates: (services) => new PermPredicates(services),
            VarInfer: (services) => new VarInferFacts(services)
        },
        subtyping: {
            RedTys: () => new RedTys(),
            Subtyping: (services) => new PermSubtyping(services),
            Futures: (services) => new Futures(services),
            Numerics: (services) => new Numerics(services)
        },
        checking: {
            Places: (services) => new PlaceTyper(services),
            MemberLookup: (services) => new MemberLookup(services),
            Types: (services) => new Types(services),
            Exprs: (services) => new Exprs(services),
            Calls: (services) => new Calls(services),
            Blocks: (services) => new Blocks(services),
            Functions: (services) => new Functions(services)
        }
    };
}

/**
 * Creates the full set of checker services. Fields missing from `config`
 * take their default values.
 */
export function createPermServices(config: Partial<CheckerConfig> = {}): PermServices {
    return inject(createPermModule({ ...DEFAULT_CHECKER_CONFIG, ...config }));
}
