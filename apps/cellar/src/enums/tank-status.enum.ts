export enum TankStatus {
    ACTIVE = 'ACTIVE',
    DELETED = 'DELETED'     // soft deleted, kept for history
}
