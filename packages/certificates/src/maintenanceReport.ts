import { z } from "zod";

import {
  DecodeError,
  TYPE_TAG,
  identityHash,
  type ComplexSerializable,
  type TypeDescriptor,
} from "@docformat/core";

import { sanitizeDate, sanitizeLink, sanitizeString } from "./sanitize";

export const MAINTENANCE_REPORT_TAG = "MaintenanceReport";

export type MaintenanceReportInput = Readonly<{
  date: string | Date | null | undefined;
  title?: string | null;
  reportLink?: string | null;
  stLink?: string | null;
}>;

/**
 * Assurance-continuity update published for a certified product.
 */
export class MaintenanceReport implements ComplexSerializable {
  public readonly date: string | null;
  public readonly title: string | null;
  public readonly reportLink: string | null;
  public readonly stLink: string | null;

  private constructor(
    date: string | null,
    title: string | null,
    reportLink: string | null,
    stLink: string | null
  ) {
    this.date = date;
    this.title = title;
    this.reportLink = reportLink;
    this.stLink = stLink;
    Object.freeze(this);
  }

  static create({
    date,
    title = null,
    reportLink = null,
    stLink = null,
  }: MaintenanceReportInput): MaintenanceReport {
    return new MaintenanceReport(
      sanitizeDate(date),
      sanitizeString(title),
      sanitizeLink(reportLink),
      sanitizeLink(stLink)
    );
  }

  get [TYPE_TAG](): string {
    return MAINTENANCE_REPORT_TAG;
  }

  equals(other: MaintenanceReport): boolean {
    return (
      this.date === other.date &&
      this.title === other.title &&
      this.reportLink === other.reportLink &&
      this.stLink === other.stLink
    );
  }
}

const fieldsSchema = z.object({
  maintenance_date: z.string().nullable(),
  maintenance_title: z.string().nullable().optional(),
  maintenance_report_link: z.string().nullable().optional(),
  maintenance_st_link: z.string().nullable().optional(),
});

export const maintenanceReportDescriptor: TypeDescriptor<MaintenanceReport> = {
  encode: (value) => ({
    maintenance_date: value.date,
    maintenance_title: value.title,
    maintenance_report_link: value.reportLink,
    maintenance_st_link: value.stLink,
  }),

  decode: (fields) => {
    const parsed = fieldsSchema.safeParse(fields);
    if (!parsed.success) {
      throw new DecodeError(MAINTENANCE_REPORT_TAG, parsed.error.message, parsed.error);
    }

    return MaintenanceReport.create({
      date: parsed.data.maintenance_date,
      title: parsed.data.maintenance_title,
      reportLink: parsed.data.maintenance_report_link,
      stLink: parsed.data.maintenance_st_link,
    });
  },

  hash: (value) =>
    identityHash([value.date, value.title, value.reportLink, value.stLink]),
};
