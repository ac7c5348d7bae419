export enum TriggerType {
  Manual = 'manual',
  Scheduled = 'scheduled',
  Upstream = 'upstream'
}

export interface TimeWindow {
  from?: Date;
  to?: Date;
}
