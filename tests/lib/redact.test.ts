// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.


import { describe, expect, test } from "vitest";
import { displayCommand, isSensitiveKey, redactArg } from "../../src/lib/redact";

describe("isSensitiveKey", () => {
  test("matches secret-looking names in any case", () => {
    expect(isSensitiveKey("DB_PASSWORD")).toBe(true);
    expect(isSensitiveKey("directus_secret")).toBe(true);
    expect(isSensitiveKey("ADMIN_TOKEN")).toBe(true);
    expect(isSensitiveKey("STORAGE_S3_KEY")).toBe(true);
    expect(isSensitiveKey("DB_USER")).toBe(false);
  });
});

describe("redactArg", () => {
  test("masks the value of a sensitive assignment", () => {
    expect(redactArg("PGPASSWORD=test-secret")).toBe("PGPASSWORD=********");
  });

  test("leaves other arguments alone", () => {
    expect(redactArg("PGUSER=directus")).toBe("PGUSER=directus");
    expect(redactArg("PGPASSWORD")).toBe("PGPASSWORD");
    expect(redactArg("--link-dest=/backups/uploads")).toBe("--link-dest=/backups/uploads");
  });
});

describe("displayCommand", () => {
  test("joins the argv with secrets masked", () => {
    expect(
      displayCommand(["docker", "compose", "exec", "-e", "PGPASSWORD=test-secret", "database"])
    ).toBe("docker compose exec -e PGPASSWORD=******** database");
  });
});
