import { z } from "zod";
import { getPostgresClient, type PostgresSingleton } from "../../clients/postgres.js";

export class ClaimLookupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClaimLookupError";
  }
}

const dateColumn = z
  .union([z.date(), z.string()])
  .nullable()
  .optional()
  .transform((value) => {
    if (value === null || value === undefined) {
      return null;
    }
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
    }
    return value.trim().length > 0 ? value.trim() : null;
  });

const textColumn = z
  .string()
  .nullable()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : null));

const numericColumn = z
  .union([z.number(), z.string()])
  .nullable()
  .optional()
  .transform((value) => {
    if (value === null || value === undefined || value === "") {
      return null;
    }
    const parsed = typeof value === "number" ? value : Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  });

export const claimRowSchema = z.object({
  claim_id: z.string().min(1),
  patient_id: textColumn,
  patient_name: textColumn,
  patient_age: numericColumn,
  patient_gender: textColumn,
  patient_state: textColumn,
  insurance_plan: textColumn,
  doctor_id: textColumn,
  doctor_name: textColumn,
  doctor_specialty: textColumn,
  network_status: textColumn,
  hospital: textColumn,
  disease: textColumn,
  procedure: textColumn,
  service_date: dateColumn,
  claim_date: dateColumn,
  processed_date: dateColumn,
  claim_amount: numericColumn,
  approved_amount: numericColumn,
  claim_status: textColumn,
  denial_reason: textColumn,
  processing_days: numericColumn,
  quarter: textColumn,
  year: numericColumn
});

export type ClaimRecord = z.infer<typeof claimRowSchema>;

export interface ClaimRepositoryPort {
  fetchById(claimId: string): Promise<ClaimRecord | null>;
}

const CLAIM_COLUMNS = Object.keys(claimRowSchema.shape).join(", ");

const formatCurrency = (value: number): string =>
  `$${value.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;

export const renderClaimText = (record: ClaimRecord): string => {
  const patient = [
    record.patient_name ?? record.patient_id,
    record.patient_age !== null ? `${record.patient_age} years old` : null,
    record.patient_gender,
    record.patient_state ? `residing in ${record.patient_state}` : null
  ]
    .filter((part): part is string => Boolean(part))
    .join(", ");
  const doctor = [record.doctor_name ?? record.doctor_id, record.doctor_specialty ? `Specialty: ${record.doctor_specialty}` : null]
    .filter((part): part is string => Boolean(part))
    .join(", ");

  const lines: Array<[string, string | null]> = [
    ["Claim ID", record.claim_id],
    ["Patient", patient || null],
    ["Insurance Plan", record.insurance_plan],
    ["Doctor", doctor || null],
    ["Network Status", record.network_status],
    ["Hospital", record.hospital],
    ["Disease/Condition", record.disease],
    ["Procedure", record.procedure],
    ["Service Date", record.service_date],
    ["Claim Date", record.claim_date],
    ["Processed Date", record.processed_date],
    ["Claim Amount", record.claim_amount !== null ? formatCurrency(record.claim_amount) : null],
    ["Approved Amount", record.approved_amount !== null ? formatCurrency(record.approved_amount) : null],
    ["Claim Status", record.claim_status],
    ["Denial Reason", record.denial_reason],
    ["Processing Time", record.processing_days !== null ? `${record.processing_days} days` : null],
    ["Quarter", record.quarter ? [record.quarter, record.year].filter((part) => part !== null).join(" ") : null]
  ];

  return lines
    .filter((entry): entry is [string, string] => entry[1] !== null)
    .map(([label, value]) => `${label}: ${value}`)
    .join("\n");
};

export const toClaimMetadata = (record: ClaimRecord): Record<string, unknown> => {
  const metadata: Record<string, unknown> = { document_type: "claim" };
  for (const [key, value] of Object.entries(record)) {
    if (value !== null) {
      metadata[key] = value;
    }
  }
  return metadata;
};

export type ClaimsConnection = Pick<PostgresSingleton, "pool" | "claimsTable">;

export class ClaimRepository implements ClaimRepositoryPort {
  constructor(private readonly connect: () => Promise<ClaimsConnection> = getPostgresClient) {}

  async fetchById(claimId: string): Promise<ClaimRecord | null> {
    let rows: unknown[];
    try {
      const { pool, claimsTable } = await this.connect();
      const result = await pool.query(
        `
          SELECT ${CLAIM_COLUMNS}
          FROM ${claimsTable}
          WHERE UPPER(claim_id) = $1
          LIMIT 1
        `,
        [claimId.trim().toUpperCase()]
      );
      rows = result.rows;
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown database error";
      throw new ClaimLookupError(`Claim lookup failed for ${claimId}: ${message}`, { cause: error });
    }

    const [row] = rows;
    if (row === undefined) {
      return null;
    }

    const parsed = claimRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new ClaimLookupError(
        `Claim row for ${claimId} is malformed: ${parsed.error.issues.map((issue) => issue.path.join(".")).join(", ")}`
      );
    }
    return parsed.data;
  }
}
