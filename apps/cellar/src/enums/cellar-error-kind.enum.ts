export enum CellarErrorKind {
    NOT_FOUND = 'NOT_FOUND',
    CONFLICT = 'CONFLICT',
    VALIDATION = 'VALIDATION',
    INFRASTRUCTURE = 'INFRASTRUCTURE'
}
