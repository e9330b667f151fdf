// transaction types the service itself generates
export enum TransactionSystemRole {
    TRANSFER_IN = 'TRANSFER_IN',
    TRANSFER_OUT = 'TRANSFER_OUT',
    WASTE = 'WASTE'
}
