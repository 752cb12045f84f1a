// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import {
  BACKUP_DATE_PATTERN,
  formatBackupDate,
  formatBytes,
  formatLogTimestamp,
  unixSeconds,
} from "../../src/lib/format";

describe("formatBytes", () => {
  test("bytes below a kilobyte stay whole", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(1023)).toBe("1023 B");
  });

  test("larger sizes get two decimals", () => {
    expect(formatBytes(1536)).toBe("1.50 KB");
    expect(formatBytes(1024 ** 2)).toBe("1.00 MB");
    expect(formatBytes(3 * 1024 ** 3)).toBe("3.00 GB");
  });
});

describe("dates", () => {
  const at = new Date(2026, 2, 1, 2, 3, 4);

  test("formatBackupDate pads every field", () => {
    expect(formatBackupDate(at)).toBe("2026-03-01_02-03-04");
    expect(BACKUP_DATE_PATTERN.test(formatBackupDate(at))).toBe(true);
  });

  test("formatLogTimestamp", () => {
    expect(formatLogTimestamp(at)).toBe("2026-03-01 02:03:04");
  });

  test("unixSeconds truncates milliseconds", () => {
    expect(unixSeconds(new Date(1_700_000_000_999))).toBe(1_700_000_000);
  });
});
