/**
 * Error codes emitted by the permission checker.
 *
 * Codes are grouped by the stage that reports them. The string value is what
 * ends up in the `code` field of an LSP diagnostic.
 */
export enum ErrorCode {
    // Names and generic arguments (PCE001-PCE019)
    PC_UNRESOLVED_NAME = 'PCE001',
    PC_NO_SUCH_ITEM = 'PCE002',
    PC_NO_SUCH_MEMBER = 'PCE003',
    PC_UNEXPECTED_GENERIC_ARGS = 'PCE004',
    PC_GENERIC_ARG_COUNT_MISMATCH = 'PCE005',
    PC_GENERIC_KIND_MISMATCH = 'PCE006',
    PC_EXPECTED_TYPE = 'PCE007',
    PC_EXPECTED_PERMISSION = 'PCE008',
    PC_EXPECTED_PLACE = 'PCE009',

    // Expressions and calls (PCE020-PCE049)
    PC_EXPECTED_EXPRESSION = 'PCE020',
    PC_MISSING_CALL_TO_METHOD = 'PCE021',
    PC_NOT_CALLABLE = 'PCE022',
    PC_CALL_ARG_COUNT_MISMATCH = 'PCE023',
    PC_CLASS_HAS_NO_NEW = 'PCE024',
    PC_CLASS_NEW_NOT_A_FUNCTION = 'PCE025',
    PC_RETURN_OUTSIDE_FUNCTION = 'PCE026',
    PC_NOT_IMPLEMENTED = 'PCE027',
    PC_ASSOCIATED_FUNCTION_ON_INSTANCE = 'PCE028',
    PC_INVALID_INTEGER_LITERAL = 'PCE029',

    // Type obligations (PCE050-PCE079)
    PC_TYPE_MISMATCH = 'PCE050',
    PC_INVALID_ASSIGNMENT = 'PCE051',
    PC_INVALID_RETURN_VALUE = 'PCE052',
    PC_NUMERIC_TYPE_EXPECTED = 'PCE053',
    PC_OPERANDS_MUST_MATCH = 'PCE054',
    PC_BOOLEAN_EXPECTED = 'PCE055',
    PC_AWAIT_NON_FUTURE = 'PCE056',
    PC_PERMISSION_MISMATCH = 'PCE057',
    PC_TYPE_ANNOTATIONS_NEEDED = 'PCE058',
    PC_UNIVERSE_ESCAPE = 'PCE059',
    PC_INVALID_LET_INITIALIZER = 'PCE060',

    // Predicates (PCE080-PCE099)
    PC_NOT_COPY = 'PCE080',
    PC_NOT_MOVE = 'PCE081',
    PC_NOT_OWNED = 'PCE082',
    PC_NOT_LENT = 'PCE083',
    PC_WHERE_CLAUSE_NOT_SATISFIED = 'PCE084',
}
