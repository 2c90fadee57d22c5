export type { IAccountStore } from './IAccountStore';
export type { ITeamStore } from './ITeamStore';
export type { ISessionStore } from './ISessionStore';
export type { IDataSourceStore } from './IDataSourceStore';
