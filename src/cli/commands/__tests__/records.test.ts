/**
 * Tests for the rosters, leave, locations, departments and webhooks commands
 */

import { describe, it, expect, vi } from 'vitest';
import { createStubApi, runCli } from '../../../test-utils/index.js';
import { createDepartmentsCommand } from '../departments.js';
import { createLeaveCommand } from '../leave.js';
import { createLocationsCommand } from '../locations.js';
import { createRostersCommand } from '../rosters.js';
import { createWebhooksCommand } from '../webhooks.js';

const unusedContext = () => {
  throw new Error('context not expected');
};

describe('command structure', () => {
  it.each([
    [createRostersCommand, 'rosters', ['roster', 'shifts']],
    [createLeaveCommand, 'leave', []],
    [createLocationsCommand, 'locations', ['location', 'loc']],
    [createDepartmentsCommand, 'departments', ['department', 'dept', 'areas']],
    [createWebhooksCommand, 'webhooks', ['webhook']],
  ])('%#: names and aliases', (create, name, aliases) => {
    const cmd = create(unusedContext);

    expect(cmd.name()).toBe(name);
    expect(cmd.aliases()).toEqual(aliases);
    expect(cmd.commands.map((c) => c.name())).toEqual(['list', 'get']);
  });
});

describe('rosters list', () => {
  it('shows shift times and publication', async () => {
    const api = createStubApi({
      listRosters: vi
        .fn()
        .mockResolvedValue([{ Id: 80, Date: '2024-01-01', StartTime: 1704099600, EndTime: 1704128400, Employee: 7, Published: true }]),
    });

    const result = await runCli(['shifts', 'list', '--no-color'], { api, tty: true });

    expect(result.stdout).toBe(
      'ID  DATE        START  END    EMPLOYEE  PUBLISHED\n80  2024-01-01  09:00  17:00  7         Yes\n'
    );
  });
});

describe('leave list', () => {
  it('right-aligns days', async () => {
    const api = createStubApi({
      listLeave: vi
        .fn()
        .mockResolvedValue([{ Id: 50, Employee: 7, DateStart: '2024-03-04', DateEnd: '2024-03-05', Days: 2, Status: 1 }]),
    });

    const result = await runCli(['leave', 'list', '--no-color'], { api, tty: true });

    expect(result.stdout).toBe(
      'ID  EMPLOYEE  START       END         DAYS  STATUS\n50  7         2024-03-04  2024-03-05   2.0  Approved\n'
    );
  });

  it('passes paging to the API', async () => {
    const api = createStubApi({ listLeave: vi.fn().mockResolvedValue([]) });

    await runCli(['leave', 'list', '--limit', '5', '--offset', '10'], { api });

    expect(api.listLeave).toHaveBeenCalledWith({ limit: 5, offset: 10 });
  });
});

describe('locations list', () => {
  it('falls back to the company code', async () => {
    const api = createStubApi({
      listLocations: vi.fn().mockResolvedValue([
        { Id: 3, CompanyName: 'Harbour Cafe', Code: 'HBC', Active: true },
        { Id: 4, CompanyName: 'Depot', CompanyCode: 'DEP', Active: false },
      ]),
    });

    const result = await runCli(['loc', 'list', '--no-color'], { api, tty: true });

    expect(result.stdout).toBe(
      'ID  NAME          CODE  ACTIVE\n3   Harbour Cafe  HBC   Yes\n4   Depot         DEP   No\n'
    );
  });
});

describe('departments list', () => {
  it('shows the owning company', async () => {
    const api = createStubApi({
      listDepartments: vi
        .fn()
        .mockResolvedValue([{ Id: 11, CompanyName: 'Kitchen', CompanyCode: 'KIT', Company: 3, Active: true }]),
    });

    const result = await runCli(['areas', 'list', '--no-color'], { api, tty: true });

    expect(result.stdout).toBe('ID  NAME     CODE  COMPANY  ACTIVE\n11  Kitchen  KIT   3        Yes\n');
  });
});

describe('webhooks', () => {
  it('lists webhook targets', async () => {
    const api = createStubApi({
      listWebhooks: vi
        .fn()
        .mockResolvedValue([{ Id: 2, Topic: 'Timesheet.Insert', Address: 'https://hooks.example.test/ts', Enabled: true }]),
    });

    const result = await runCli(['webhooks', 'list', '--no-color'], { api, tty: true });

    expect(result.stdout).toBe(
      'ID  TOPIC             URL                            ENABLED\n' +
        '2   Timesheet.Insert  https://hooks.example.test/ts  Yes\n'
    );
  });

  it('shows one webhook', async () => {
    const api = createStubApi({
      getWebhook: vi.fn().mockResolvedValue({
        Id: 2,
        Topic: 'Timesheet.Insert',
        Address: 'https://hooks.example.test/ts',
        Type: 'URL',
        Enabled: false,
      }),
    });

    const result = await runCli(['webhook', 'get', '2', '--no-color'], { api, tty: true });

    expect(api.getWebhook).toHaveBeenCalledWith(2);
    expect(result.stdout).toBe(
      'ID:       2\nTopic:    Timesheet.Insert\nURL:      https://hooks.example.test/ts\nType:     URL\n' +
        'Enabled:  No\nCreated:\nModified:\n'
    );
  });
});
