/**
 * Response schemas for the Deputy v1 API
 *
 * Only the fields the CLI reads are declared; `.passthrough()` keeps every
 * other field, so JSON output shows the record exactly as the API sent it
 * (PascalCase keys included).
 */

import { z } from 'zod';

const text = z.string().nullish();
const num = z.number().nullish();
const flag = z.boolean().nullish();

export const EmployeeSchema = z
  .object({
    Id: z.number(),
    FirstName: text,
    LastName: text,
    DisplayName: text,
    Email: text,
    Mobile: text,
    Active: flag,
    Company: num,
    Role: num,
    StartDate: text,
    TerminationDate: text,
  })
  .passthrough();

export type Employee = z.infer<typeof EmployeeSchema>;

export const TimesheetSchema = z
  .object({
    Id: z.number(),
    Employee: num,
    Date: text,
    /** Unix seconds */
    StartTime: num,
    /** Unix seconds; 0 while in progress */
    EndTime: num,
    TotalTime: num,
    TotalTimeStr: text,
    OperationalUnit: num,
    IsInProgress: flag,
    IsLeave: flag,
    Comment: text,
    Cost: num,
  })
  .passthrough();

export type Timesheet = z.infer<typeof TimesheetSchema>;

export const RosterSchema = z
  .object({
    Id: z.number(),
    Date: text,
    StartTime: num,
    EndTime: num,
    Mealbreak: text,
    Employee: num,
    OperationalUnit: num,
    Open: flag,
    Published: flag,
    Comment: text,
  })
  .passthrough();

export type Roster = z.infer<typeof RosterSchema>;

export const LeaveSchema = z
  .object({
    Id: z.number(),
    Employee: num,
    Company: num,
    DateStart: text,
    DateEnd: text,
    /** 0 awaiting, 1 approved, 2 declined, 3 cancelled, 4 pay pending, 5 pay approved */
    Status: num,
    Hours: num,
    Days: num,
    ApproveBy: num,
    Comment: text,
    LeaveRule: num,
  })
  .passthrough();

export type Leave = z.infer<typeof LeaveSchema>;

export const LocationSchema = z
  .object({
    Id: z.number(),
    CompanyName: text,
    Code: text,
    CompanyCode: text,
    /** A street address, or the id of an Address record */
    Address: z.union([z.string(), z.number()]).nullish(),
    Active: flag,
    Timezone: text,
  })
  .passthrough();

export type Location = z.infer<typeof LocationSchema>;

export const DepartmentSchema = z
  .object({
    Id: z.number(),
    Company: num,
    ParentId: num,
    CompanyName: text,
    CompanyCode: text,
    Active: flag,
    SortOrder: num,
  })
  .passthrough();

export type Department = z.infer<typeof DepartmentSchema>;

export const WebhookSchema = z
  .object({
    Id: z.number(),
    Topic: text,
    /** Target URL */
    Address: text,
    Type: text,
    Enabled: flag,
    Created: text,
    Modified: text,
  })
  .passthrough();

export type Webhook = z.infer<typeof WebhookSchema>;

/** Award library entries vary by country; every field is optional */
export const AwardSchema = z
  .object({
    Id: num,
    AwardCode: text,
    Code: text,
    Name: text,
    AwardName: text,
    CountryCode: text,
    Country: text,
  })
  .passthrough();

export type Award = z.infer<typeof AwardSchema>;

export const AgreementSchema = z
  .object({
    Id: z.number(),
    Employee: num,
    Active: flag,
    BaseRate: num,
    Contract: num,
    PayPoint: num,
  })
  .passthrough();

export type Agreement = z.infer<typeof AgreementSchema>;

export const SalesDataSchema = z
  .object({
    Id: z.number(),
    Company: num,
    Area: num,
    /** Unix seconds */
    Timestamp: num,
    Value: num,
    Type: text,
  })
  .passthrough();

export type SalesData = z.infer<typeof SalesDataSchema>;

export const MemoSchema = z
  .object({
    Id: z.number(),
    Content: text,
    Company: num,
    Creator: num,
    /** Unix seconds */
    Created: num,
  })
  .passthrough();

export type Memo = z.infer<typeof MemoSchema>;

export const JournalSchema = z
  .object({
    Id: z.number(),
    Employee: num,
    Company: num,
    Comment: text,
    /** Unix seconds */
    Created: num,
    Category: num,
  })
  .passthrough();

export type Journal = z.infer<typeof JournalSchema>;

export const MeInfoSchema = z
  .object({
    UserId: num,
    EmployeeId: num,
    Login: text,
    Name: text,
    FirstName: text,
    LastName: text,
    PrimaryEmail: text,
    PrimaryPhone: text,
    Company: num,
    Portfolio: text,
    Role: num,
  })
  .passthrough();

export type MeInfo = z.infer<typeof MeInfoSchema>;

export const ResourceInfoSchema = z
  .object({
    name: z.string(),
    fields: z.record(z.unknown()).default({}),
    /** A map of association name to target, or a list of names */
    assocs: z.union([z.record(z.unknown()), z.array(z.unknown())]).nullish(),
  })
  .passthrough();

export type ResourceInfo = z.infer<typeof ResourceInfoSchema>;

/** Any resource record, as returned by the generic resource endpoints */
export const ResourceRecordSchema = z.record(z.unknown());

export type ResourceRecord = z.infer<typeof ResourceRecordSchema>;
