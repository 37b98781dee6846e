// CHANGE: CLI runner for the architecture rules
// PURITY: SHELL (reads filesystem, writes console, exits process)
// INVARIANT: errors.length = 0 → exit(0), else exit(1)

import { Project } from "ts-morph";

import { collectViolations } from "./architecture-rules.js";

/**
 * Verify every source file under src/.
 *
 * @pure false - executes all checkers, exits process
 */
function verifyArchitecture(): void {
	console.log("🔍 Verifying architecture rules...\n");

	const project = new Project({ skipAddingFilesFromTsConfig: true });
	project.addSourceFilesAtPaths("src/**/*.ts");

	const violations = collectViolations(project.getSourceFiles());
	const errors = violations.filter((v) => v.severity === "error");
	const warnings = violations.filter((v) => v.severity === "warning");

	for (const v of errors) {
		console.error(`  [ERROR] ${v.file}:${v.line}\n  Rule: ${v.rule}\n  ${v.message}\n`);
	}
	for (const v of warnings) {
		console.warn(`  [WARN] ${v.file}:${v.line}\n  Rule: ${v.rule}\n  ${v.message}\n`);
	}

	if (errors.length > 0) {
		console.error(`\n📊 Total: ${errors.length} errors, ${warnings.length} warnings\n`);
		process.exit(1);
	}
	console.log(`✅ Architecture verification passed (${warnings.length} warnings)`);
}

verifyArchitecture();
