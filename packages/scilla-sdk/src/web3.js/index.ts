export * from './account'
export * from './cluster'
export * from './history'
export * from './stakeAccount'
export * from './voteAccount'
