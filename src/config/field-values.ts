// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

export const ENVIRONMENT_VALUES = ["prod", "dev", "local"] as const;
export type Environment = (typeof ENVIRONMENT_VALUES)[number];

export const ID_GENERATOR_VALUES = ["uuid", "hash"] as const;
export type IdGenerator = (typeof ID_GENERATOR_VALUES)[number];

export const GZIP_LEVEL_MIN = 1;
export const GZIP_LEVEL_MAX = 9;
export const GZIP_LEVEL_DEFAULT = 9;
