export enum CellarRule {
    // not found
    ENTITY_NOT_FOUND = 'ENTITY_NOT_FOUND',

    // conflict
    DUPLICATE_LABEL = 'DUPLICATE_LABEL',
    TANK_OCCUPIED = 'TANK_OCCUPIED',
    BATCH_COMPLETED = 'BATCH_COMPLETED',
    TANK_ALREADY_DELETED = 'TANK_ALREADY_DELETED',
    TANK_NOT_DELETED = 'TANK_NOT_DELETED',
    UNIQUE_VIOLATION = 'UNIQUE_VIOLATION',

    // validation
    INVALID_TRANSACTION_TYPE = 'INVALID_TRANSACTION_TYPE',
    INVALID_QUANTITY = 'INVALID_QUANTITY',
    INSUFFICIENT_QUANTITY = 'INSUFFICIENT_QUANTITY',
    EXCEEDS_CAPACITY = 'EXCEEDS_CAPACITY',
    NOTHING_TO_TRANSFER = 'NOTHING_TO_TRANSFER',
    DESTINATION_NOT_ACTIVE = 'DESTINATION_NOT_ACTIVE',
    SAME_TANK_TRANSFER = 'SAME_TANK_TRANSFER',
    CAPACITY_BELOW_CONTENTS = 'CAPACITY_BELOW_CONTENTS',
    INVALID_LABEL = 'INVALID_LABEL',
    INVALID_CAPACITY = 'INVALID_CAPACITY',
    INVALID_CAPACITY_UNIT = 'INVALID_CAPACITY_UNIT',
    TANK_DELETED = 'TANK_DELETED',
    INVALID_PAYLOAD = 'INVALID_PAYLOAD',

    // infrastructure
    STORAGE_FAILURE = 'STORAGE_FAILURE'
}
