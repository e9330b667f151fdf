export enum BatchMilestone {
    YEAST = 'YEAST',
    STABILIZER = 'STABILIZER'
}
