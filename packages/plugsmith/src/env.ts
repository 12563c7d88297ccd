import { DEFAULT_HOSTED_BASE_URL } from "@/src/constants"

export const PLUGSMITH_COMMAND_PREFIX = readOptional("PLUGSMITH_COMMAND_PREFIX")

export const PLUGSMITH_ROOT = readOptional("PLUGSMITH_ROOT")

export const PLUGSMITH_HOSTED_BASE_URL = normalizeBaseUrl(
	readOptional("PLUGSMITH_HOSTED_BASE_URL") ?? DEFAULT_HOSTED_BASE_URL,
)

function readOptional(name: string): string | undefined {
	const value = process.env[name]?.trim()
	return value ? value : undefined
}

function normalizeBaseUrl(baseUrl: string): string {
	return baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl
}
