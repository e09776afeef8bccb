/**
 * Team configuration (team.toml) parser
 */

import { readFile } from 'node:fs/promises'
import TOML from '@iarna/toml'

import { ConfigParseError, ConfigValidationError, errnoCode } from '../errors.js'
import { validateTeamFile } from '../schemas/index.js'
import type { TeamFile } from '../types/config.js'
import type { TeamConfig } from '../types/team.js'

/** Default filename for team configuration */
export const TEAM_FILENAME = 'team.toml'

export function normalizeTeamFile(file: TeamFile): TeamConfig {
  return {
    name: file.name,
    members: file.members ?? [],
    cacheStrategy: file.cache_strategy ?? 'balanced',
    bundleDependencies: file.bundle_dependencies ?? [],
  }
}

/**
 * Parse team.toml content into a validated TeamConfig
 *
 * @throws ConfigParseError if TOML parsing fails
 * @throws ConfigValidationError if schema validation fails
 */
export function parseTeamToml(content: string, filePath?: string): TeamConfig {
  const source = filePath ?? TEAM_FILENAME

  let parsed: unknown
  try {
    parsed = TOML.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to parse TOML: ${message}`, source)
  }

  const result = validateTeamFile(parsed)
  if (!result.valid) {
    throw new ConfigValidationError(`Invalid ${TEAM_FILENAME}`, source, result.errors)
  }

  return normalizeTeamFile(result.data)
}

/**
 * Read and parse a team.toml file from disk
 */
export async function readTeamToml(filePath: string): Promise<TeamConfig> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new ConfigParseError('File not found', filePath)
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to read file: ${message}`, filePath)
  }
  return parseTeamToml(content, filePath)
}

/** Serialize a TeamConfig back to TOML */
export function serializeTeamToml(config: TeamConfig): string {
  const file = {
    name: config.name,
    members: config.members,
    cache_strategy: config.cacheStrategy,
    bundle_dependencies: config.bundleDependencies,
  } satisfies TeamFile
  return TOML.stringify(file)
}
