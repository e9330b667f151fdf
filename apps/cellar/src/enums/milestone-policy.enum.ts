export enum MilestonePolicy {
    FIRST_OCCURRENCE = 'FIRST_OCCURRENCE',  // stamp once, later events leave it alone
    ALWAYS_LATEST = 'ALWAYS_LATEST'         // every matching event overwrites it
}
