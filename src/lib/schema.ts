import type { SchemaDescription } from "@/lib/types";

export const PRIMARY_TABLE = "sf_police_calls_rt";

/** Table and column list sent to the provider in direct mode and served at /api/schema. */
export const INCIDENT_SCHEMA: SchemaDescription = {
  tables: [
    {
      name: "sf_police_calls_rt",
      description: "Police CAD calls (911 dispatch), one row per call.",
      columns: [
        { name: "cad_id", type: "TEXT" },
        { name: "received_datetime", type: "TEXT" },
        { name: "dispatch_datetime", type: "TEXT" },
        { name: "closed_datetime", type: "TEXT" },
        { name: "call_type", type: "TEXT" },
        { name: "priority", type: "INTEGER" },
        { name: "disposition", type: "TEXT" },
        { name: "neighborhood", type: "TEXT" },
        { name: "latitude", type: "REAL" },
        { name: "longitude", type: "REAL" },
      ],
    },
    {
      name: "sf_fire_ems_calls",
      description: "Fire and EMS incidents, one row per call.",
      columns: [
        { name: "call_number", type: "TEXT" },
        { name: "incident_number", type: "TEXT" },
        { name: "received_datetime", type: "TEXT" },
        { name: "dispatch_datetime", type: "TEXT" },
        { name: "unit_id", type: "TEXT" },
        { name: "call_type", type: "TEXT" },
        { name: "disposition", type: "TEXT" },
        { name: "neighborhood", type: "TEXT" },
        { name: "latitude", type: "REAL" },
        { name: "longitude", type: "REAL" },
      ],
    },
    {
      name: "sf_311_cases",
      description: "311 infrastructure and social complaints.",
      columns: [
        { name: "case_id", type: "TEXT" },
        { name: "opened_datetime", type: "TEXT" },
        { name: "closed_datetime", type: "TEXT" },
        { name: "status", type: "TEXT" },
        { name: "category", type: "TEXT" },
        { name: "subcategory", type: "TEXT" },
        { name: "neighborhood", type: "TEXT" },
        { name: "latitude", type: "REAL" },
        { name: "longitude", type: "REAL" },
      ],
    },
    {
      name: "sf_shelter_waitlist",
      description: "Shelter waitlist snapshots per neighborhood.",
      columns: [
        { name: "record_id", type: "TEXT" },
        { name: "snapshot_date", type: "TEXT" },
        { name: "neighborhood", type: "TEXT" },
        { name: "people_waiting", type: "INTEGER" },
        { name: "shelter_type", type: "TEXT" },
      ],
    },
    {
      name: "sf_homeless_baseline",
      description: "Baseline unhoused population counts per neighborhood.",
      columns: [
        { name: "neighborhood", type: "TEXT" },
        { name: "unsheltered_count", type: "INTEGER" },
        { name: "sheltered_count", type: "INTEGER" },
        { name: "snapshot_year", type: "INTEGER" },
      ],
    },
    {
      name: "sf_disaster_events",
      description: "Fire, hazmat, earthquake, flood and outage events. severity is Low, Medium, High or Critical.",
      columns: [
        { name: "event_id", type: "TEXT" },
        { name: "event_type", type: "TEXT" },
        { name: "description", type: "TEXT" },
        { name: "timestamp", type: "TEXT" },
        { name: "latitude", type: "REAL" },
        { name: "longitude", type: "REAL" },
        { name: "neighborhood", type: "TEXT" },
        { name: "severity", type: "TEXT" },
        { name: "source", type: "TEXT" },
      ],
    },
    {
      name: "neighborhoods",
      description: "Neighborhood metadata.",
      columns: [
        { name: "name", type: "TEXT" },
        { name: "population", type: "INTEGER" },
        { name: "seniors_65_plus", type: "INTEGER" },
      ],
    },
  ],
};

export function describeSchema(schema: SchemaDescription) {
  return schema.tables
    .map((t) => `${t.name}(${t.columns.map((c) => `${c.name} ${c.type}`).join(", ")})`)
    .join("\n");
}
