export type * from './rebase'
export type * from './repo'
