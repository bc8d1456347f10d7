import { z } from "zod"

// Host platforms jpackage can target
export const PlatformSchema = z.enum(["windows", "linux", "macos"])

export type Platform = z.infer<typeof PlatformSchema>

// Project metadata read from pom.xml
export interface ProjectMetadata {
	name: string
	version: string
}

// Packaging options collected from the command line
export const PackagingOptionsSchema = z.object({
	mainClass: z
		.string()
		.trim()
		.min(1, "Main class must not be empty")
		.describe("Fully qualified entry-point class."),
	license: z.string().min(1).default("LICENSE"),
	icon: z.string().min(1).default("appicon"),
	output: z
		.string()
		.min(1)
		.optional()
		.describe("Installer destination. Defaults to the working directory."),
	vendor: z.string().min(1).default("Unknown"),
	description: z.string().min(1).default("A Java application."),
	installerName: z
		.string()
		.min(1)
		.optional()
		.describe("Exact installer file name to verify after packaging."),
	skipBuild: z.boolean().default(false),
	verbose: z.boolean().default(false),
})

export type PackagingOptions = z.infer<typeof PackagingOptionsSchema>

// The dependency-bundled jar produced by the build
export interface BuildArtifact {
	path: string
	directory: string
	fileName: string
}

// Executables for the two external tools
export interface ToolCommands {
	maven: string
	jpackage: string
}
