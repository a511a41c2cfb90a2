import { Pool } from "pg";
import { z } from "zod";

import type { ComponentMapping, FeatureRef } from "../catalog/builder.js";
import type { DatabaseSettings } from "../config/settings.js";
import { ValidationError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";

/** Read-only slice of the pg API used by the bridge; `Pool` satisfies it. */
export interface Queryable {
  query(text: string): Promise<{ rows: unknown[] }>;
}

export const COMPONENT_MAPPING_QUERY =
  "SELECT component_id, identifier, component_name FROM source_data.component_mapping " +
  "WHERE mapping_type = 'it_business_application' ORDER BY component_id";

const mappingRowSchema = z.object({
  component_id: z.union([z.string(), z.number()]).transform(String),
  identifier: z.string().nullable().transform((value) => value ?? ""),
  component_name: z.string().min(1),
});

/** Opens a pool against the mapping database; the caller ends it. */
export function createPool(settings: DatabaseSettings): Pool {
  return new Pool({
    host: settings.host,
    port: settings.port,
    database: settings.database,
    user: settings.user,
    ...(settings.password === undefined ? {} : { password: settings.password }),
    max: 2,
  });
}

/**
 * Turns the application rows of the mapping database into component mappings.
 * Applications are dealt to the catalog features round robin, in query order.
 * The query runs once; later calls return the first answer.
 */
export class ComponentMappingBridge {
  private pending: Promise<ComponentMapping[]> | null = null;

  constructor(
    private readonly db: Queryable,
    private readonly logger: StructuredLogger,
  ) {}

  fetchMappings(features: readonly FeatureRef[]): Promise<ComponentMapping[]> {
    if (!this.pending) {
      this.pending = this.load(features);
    }
    return this.pending;
  }

  private async load(features: readonly FeatureRef[]): Promise<ComponentMapping[]> {
    const result = await this.db.query(COMPONENT_MAPPING_QUERY);
    const rows = result.rows.map((row, index) => {
      const parsed = mappingRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new ValidationError(`component mapping row ${index} is malformed`, { issues: parsed.error.issues });
      }
      return parsed.data;
    });
    this.logger.info("component_mapping_rows_loaded", { rows: rows.length, features: features.length });

    if (features.length === 0) {
      if (rows.length > 0) {
        this.logger.warn("component_mapping_no_features", { rows: rows.length });
      }
      return [];
    }

    const mappings: ComponentMapping[] = [];
    const seen = new Set<string>();
    rows.forEach((row, index) => {
      const feature = features[index % features.length];
      if (!feature) {
        return;
      }
      const key = `${feature.projectKey}:${row.component_name}`;
      if (seen.has(key)) {
        this.logger.warn("component_mapping_duplicate", {
          project: feature.projectKey,
          component: row.component_name,
          component_id: row.component_id,
        });
        return;
      }
      seen.add(key);
      mappings.push({
        componentName: row.component_name,
        componentId: row.component_id,
        identifier: row.identifier,
        projectKey: feature.projectKey,
        featureQualifyingName: feature.qualifyingName,
      });
    });
    return mappings;
  }
}
