/**
 * One unit of work: three locators fetched and validated together
 */
export interface DispatchRow {
  sequencePath: string;
  labelPath: string;
  thirdDataPath: string;
}
