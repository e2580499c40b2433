import { describe, expect, it } from "vitest";

import { ConfigValidationError } from "../../../src/config/errors.js";
import {
  buildLibrarianConfig,
  deploymentEnvVars,
  deriveRuntimeEnv,
  engineAppId,
  reasoningEngineResourceName,
  resolveAgentModel,
  stagingBucketUri,
} from "../../../src/config/librarian.js";

const shipped = {
  PROJECT_ID: "d001-000-chiel-dev",
  LOCATION: "us-central1",
  LOG_LEVEL: "ERROR",
  IS_LOCAL: "false",
  PROJECT_LIBRARIAN_REASONING_ENGINE_ID: "4566541170502533120",
  ENTITY_MANAGER_MODEL: "gemini-2.5-flash",
  PROJECT_ARCHIVIST_AGENT_MODEL: "gemini-2.5-flash",
  FIRESTORE_DB_NAME: "(default)",
  STAGING_BUCKET_NAME: "project-librarian-engine-staging-d001-000-chiel-dev",
};

describe("buildLibrarianConfig", () => {
  it("builds the typed configuration from the shipped values", () => {
    expect(buildLibrarianConfig(shipped)).toEqual({
      projectId: "d001-000-chiel-dev",
      location: "us-central1",
      logLevel: "ERROR",
      isLocal: false,
      timezoneOffsetHours: 9,
      reasoningEngineId: "4566541170502533120",
      firestoreDatabase: "(default)",
      stagingBucketName: "project-librarian-engine-staging-d001-000-chiel-dev",
      agentModels: {
        entityManager: "gemini-2.5-flash",
        projectArchivist: "gemini-2.5-flash",
      },
    });
  });

  it("freezes the result", () => {
    const config = buildLibrarianConfig(shipped);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.agentModels)).toBe(true);
  });

  it("applies engine defaults", () => {
    const config = buildLibrarianConfig({ PROJECT_ID: "test-project" });

    expect(config.location).toBe("us-central1");
    expect(config.logLevel).toBe("WARNING");
    expect(config.isLocal).toBe(false);
    expect(config.firestoreDatabase).toBe("(default)");
    expect(config.reasoningEngineId).toBeUndefined();
    expect(config.agentModels).toEqual({});
  });

  it("uses no timezone offset when running locally", () => {
    const config = buildLibrarianConfig({
      PROJECT_ID: "test-project",
      IS_LOCAL: "TRUE",
    });

    expect(config.isLocal).toBe(true);
    expect(config.timezoneOffsetHours).toBe(0);
  });

  it("normalizes the bare default database name", () => {
    const config = buildLibrarianConfig({
      PROJECT_ID: "test-project",
      FIRESTORE_DB_NAME: "default",
    });

    expect(config.firestoreDatabase).toBe("(default)");
  });

  it("keeps named databases", () => {
    const config = buildLibrarianConfig({
      PROJECT_ID: "test-project",
      FIRESTORE_DB_NAME: "librarian",
    });

    expect(config.firestoreDatabase).toBe("librarian");
  });

  it("treats empty engine ID and bucket name as unset", () => {
    const config = buildLibrarianConfig({
      PROJECT_ID: "test-project",
      PROJECT_LIBRARIAN_REASONING_ENGINE_ID: "",
      STAGING_BUCKET_NAME: " ",
    });

    expect(config.reasoningEngineId).toBeUndefined();
    expect(config.stagingBucketName).toBeUndefined();
    expect(engineAppId(config)).toBe("default-app");
  });

  it("treats blank model variables as unset", () => {
    const config = buildLibrarianConfig({
      PROJECT_ID: "test-project",
      PLANNING_AGENT_MODEL: "  ",
      URL_CONTEXT_AGENT_MODEL: " test-model ",
    });

    expect(config.agentModels).toEqual({ urlContext: "test-model" });
  });

  it("lists every failing variable", () => {
    try {
      buildLibrarianConfig({ IS_LOCAL: "maybe" });
      expect.fail("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      const { message } = err as ConfigValidationError;
      expect(message).toContain("Environment validation failed:");
      expect(message).toContain("  - PROJECT_ID: PROJECT_ID is required");
      expect(message).toContain('  - IS_LOCAL: invalid truth value "maybe"');
    }
  });
});

describe("resolveAgentModel", () => {
  const config = buildLibrarianConfig(shipped);

  it("returns the configured model", () => {
    expect(resolveAgentModel(config, "entityManager")).toBe("gemini-2.5-flash");
  });

  it("returns undefined for an unset agent without fallback", () => {
    expect(resolveAgentModel(config, "planning")).toBeUndefined();
  });

  it("returns the fallback for an unset agent", () => {
    expect(resolveAgentModel(config, "planning", "fallback-model")).toBe(
      "fallback-model",
    );
  });

  it("prefers the configured model over the fallback", () => {
    expect(
      resolveAgentModel(config, "projectArchivist", "fallback-model"),
    ).toBe("gemini-2.5-flash");
  });
});

describe("derived values", () => {
  const config = buildLibrarianConfig(shipped);
  const bare = buildLibrarianConfig({ PROJECT_ID: "test-project" });

  it("derives the agent framework variables", () => {
    expect(deriveRuntimeEnv(config)).toEqual({
      GOOGLE_CLOUD_PROJECT: "d001-000-chiel-dev",
      GOOGLE_CLOUD_LOCATION: "us-central1",
      GOOGLE_GENAI_USE_VERTEXAI: "true",
      OTEL_SDK_DISABLED: "true",
    });
  });

  it("builds the deployment variables", () => {
    expect(deploymentEnvVars(config)).toEqual({
      PROJECT_ID: "d001-000-chiel-dev",
      LOCATION: "us-central1",
      FIRESTORE_DB_NAME: "(default)",
      PROJECT_LIBRARIAN_REASONING_ENGINE_ID: "4566541170502533120",
    });
    expect(
      deploymentEnvVars(bare)["PROJECT_LIBRARIAN_REASONING_ENGINE_ID"],
    ).toBe("");
  });

  it("accepts its own deployment variables", () => {
    expect(buildLibrarianConfig(deploymentEnvVars(bare))).toEqual(bare);
    expect(
      buildLibrarianConfig(deploymentEnvVars(config)).reasoningEngineId,
    ).toBe("4566541170502533120");
  });

  it("builds the reasoning engine resource name", () => {
    expect(reasoningEngineResourceName(config)).toBe(
      "projects/d001-000-chiel-dev/locations/us-central1/reasoningEngines/4566541170502533120",
    );
    expect(reasoningEngineResourceName(bare)).toBeNull();
  });

  it("builds the staging bucket URI", () => {
    expect(stagingBucketUri(config)).toBe(
      "gs://project-librarian-engine-staging-d001-000-chiel-dev",
    );
    expect(stagingBucketUri(bare)).toBeNull();
  });

  it("falls back to the default app ID", () => {
    expect(engineAppId(config)).toBe("4566541170502533120");
    expect(engineAppId(bare)).toBe("default-app");
  });
});
