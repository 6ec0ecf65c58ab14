export const openapi = {
  openapi: "3.0.3",
  info: { title: "Cell test ingestion API", version: "1.0.0" },
  components: {
    securitySchemes: {
      BearerAuth: { type: "http", scheme: "bearer" }
    },
    schemas: {
      UploadedFile: {
        type: "object",
        required: ["filename","content_base64"],
        properties: {
          filename:       { type: "string", minLength: 1 },
          content_base64: { type: "string", format: "byte" }
        }
      },
      FilePair: {
        type: "object",
        required: ["step_file","detail_file"],
        properties: {
          step_file:   { $ref: "#/components/schemas/UploadedFile" },
          detail_file: { $ref: "#/components/schemas/UploadedFile" },
          data_type:   { type: "string", enum: ["charge_discharge_cycle","capacity_test","impedance_test","aging_test","temperature_test"] }
        }
      },
      Experiment: {
        type: "object",
        required: ["name","start_date","cell_id","machine_id"],
        properties: {
          name:        { type: "string", minLength: 1 },
          operator:    { type: "string", nullable: true },
          description: { type: "string", nullable: true },
          start_date:  { type: "string", format: "date-time" },
          cell_id:     { type: "integer", minimum: 1 },
          machine_id:  { type: "integer", minimum: 1 }
        }
      },
      IngestionRequest: {
        type: "object",
        required: ["step_file","detail_file","nominal_capacity","experiment"],
        properties: {
          step_file:             { $ref: "#/components/schemas/UploadedFile" },
          detail_file:           { $ref: "#/components/schemas/UploadedFile" },
          selected_step_numbers: { type: "array", items: { type: "integer" }, minItems: 1, description: "omit to ingest every step" },
          nominal_capacity:      { type: "number", minimum: 0, description: "Ah; 0 stores c_rate 0" },
          experiment:            { $ref: "#/components/schemas/Experiment" },
          time_interval_sec:     { type: "number", minimum: 0, default: 0, description: "0 keeps every sample" },
          allow_invalid:         { type: "boolean", default: false }
        }
      },
      Error: {
        type: "object",
        properties: {
          error: {
            type: "object",
            properties: { code: { type: "string" }, message: { type: "string" }, details: {} }
          }
        }
      }
    }
  },
  security: [{ BearerAuth: [] }],
  tags: [
    { name: "Health" },
    { name: "Uploads" },
    { name: "Ingestions" },
    { name: "Time interval" }
  ],
  paths: {
    "/v1/healthz": {
      get: {
        tags: ["Health"],
        summary: "Liveness",
        security: [],
        responses: { "200": { description: "OK" } }
      }
    },
    "/v1/uploads/inspect": {
      post: {
        tags: ["Uploads"],
        summary: "Fingerprint, validate and preview a step/detail file pair without writing",
        requestBody: {
          required: true,
          content: { "application/json": { schema: { $ref: "#/components/schemas/FilePair" } } }
        },
        responses: { "200": { description: "Inspection result" }, "401": { description: "Unauthorized" }, "422": { description: "Validation error" } }
      }
    },
    "/v1/ingestions": {
      post: {
        tags: ["Ingestions"],
        summary: "Ingest a step/detail file pair into a new experiment",
        requestBody: {
          required: true,
          content: { "application/json": { schema: { $ref: "#/components/schemas/IngestionRequest" } } }
        },
        responses: {
          "201": { description: "Completed" },
          "401": { description: "Unauthorized" },
          "409": { description: "File already processed" },
          "422": { description: "Invalid files or payload", content: { "application/json": { schema: { $ref: "#/components/schemas/Error" } } } },
          "500": { description: "Storage failure during the run" }
        }
      }
    },
    "/v1/time-interval/presets": {
      get: {
        tags: ["Time interval"],
        summary: "Interval presets and bounds",
        responses: { "200": { description: "OK" }, "401": { description: "Unauthorized" } }
      }
    },
    "/v1/time-interval/recommendation": {
      get: {
        tags: ["Time interval"],
        summary: "Recommended interval for a data size and test type",
        parameters: [
          { name: "size", in: "query", required: true, schema: { type: "integer", minimum: 0 } },
          { name: "data_type", in: "query", required: false, schema: { type: "string" } }
        ],
        responses: { "200": { description: "OK" }, "401": { description: "Unauthorized" }, "422": { description: "Validation error" } }
      }
    }
  }
};
