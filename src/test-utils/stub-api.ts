import type { DeputyApi } from '../api/index.js';

function notStubbed(method: string): () => Promise<never> {
  return () => Promise.reject(new Error(`DeputyApi.${method} was called but not stubbed`));
}

/**
 * A DeputyApi whose methods reject unless overridden.
 */
export function createStubApi(overrides: Partial<DeputyApi> = {}): DeputyApi {
  return {
    me: notStubbed('me'),
    myTimesheets: notStubbed('myTimesheets'),
    myRosters: notStubbed('myRosters'),
    myLeave: notStubbed('myLeave'),
    listEmployees: notStubbed('listEmployees'),
    getEmployee: notStubbed('getEmployee'),
    listTimesheets: notStubbed('listTimesheets'),
    queryTimesheets: notStubbed('queryTimesheets'),
    getTimesheet: notStubbed('getTimesheet'),
    listRosters: notStubbed('listRosters'),
    getRoster: notStubbed('getRoster'),
    listLeave: notStubbed('listLeave'),
    getLeave: notStubbed('getLeave'),
    listLocations: notStubbed('listLocations'),
    getLocation: notStubbed('getLocation'),
    listDepartments: notStubbed('listDepartments'),
    getDepartment: notStubbed('getDepartment'),
    listWebhooks: notStubbed('listWebhooks'),
    getWebhook: notStubbed('getWebhook'),
    listAwards: notStubbed('listAwards'),
    listAgreements: notStubbed('listAgreements'),
    listSales: notStubbed('listSales'),
    listMemos: notStubbed('listMemos'),
    listJournals: notStubbed('listJournals'),
    resourceInfo: notStubbed('resourceInfo'),
    getResource: notStubbed('getResource'),
    ...overrides,
  };
}
