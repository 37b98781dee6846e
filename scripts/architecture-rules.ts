// CHANGE: Architecture rules for the CORE / SHELL / APP layering, checked with ts-morph
// FORMAT THEOREM: ∀ file ∈ Core: dependencies(file) ⊆ PureModules
// PURITY: SHELL (reads source files via ts-morph)
// INVARIANT: Returns violations or empty array
// COMPLEXITY: O(n) where n = number of AST nodes

import type { SourceFile } from "ts-morph";

export interface ArchitectureViolation {
	readonly file: string;
	readonly line: number;
	readonly rule: string;
	readonly message: string;
	readonly severity: "error" | "warning";
}

const isCore = (sourceFile: SourceFile): boolean =>
	sourceFile.getFilePath().includes("/src/core/");
const isShell = (sourceFile: SourceFile): boolean =>
	sourceFile.getFilePath().includes("/src/shell/");

/**
 * CORE must not import SHELL, APP or Node built-ins.
 *
 * @invariant ∀ f ∈ Core: imports(f) ∩ (Shell ∪ App ∪ node:*) = ∅
 * @complexity O(m) where m = number of imports in file
 */
export function checkCoreImports(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!isCore(sourceFile)) return [];

	const violations: ArchitectureViolation[] = [];
	for (const importDecl of sourceFile.getImportDeclarations()) {
		const moduleSpecifier = importDecl.getModuleSpecifierValue();
		const rule = moduleSpecifier.includes("/shell/")
			? "core-no-shell-imports"
			: moduleSpecifier.includes("/app/")
				? "core-no-app-imports"
				: moduleSpecifier.startsWith("node:")
					? "core-no-node-builtins"
					: null;
		if (rule !== null) {
			violations.push({
				file: sourceFile.getFilePath(),
				line: importDecl.getStartLineNumber(),
				rule,
				message: `CORE file imports ${moduleSpecifier}`,
				severity: "error",
			});
		}
	}
	return violations;
}

/**
 * SHELL must not import APP.
 *
 * @complexity O(m)
 */
export function checkShellImports(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!isShell(sourceFile)) return [];
	return sourceFile
		.getImportDeclarations()
		.filter((d) => d.getModuleSpecifierValue().includes("/app/"))
		.map((d) => ({
			file: sourceFile.getFilePath(),
			line: d.getStartLineNumber(),
			rule: "shell-no-app-imports",
			message: `SHELL file imports APP: ${d.getModuleSpecifierValue()}`,
			severity: "error" as const,
		}));
}

const IMPURE_PATTERNS: readonly { readonly pattern: RegExp; readonly name: string }[] = [
	{ pattern: /^console\.(log|error|warn|info|debug)$/, name: "console output" },
	{ pattern: /^process\.(exit|env|argv|stdout|stderr)$/, name: "process access" },
];

/**
 * CORE must not reach the console or the process.
 *
 * @invariant ∀ f ∈ CoreFunctions: ¬hasSideEffects(f)
 * @complexity O(n) where n = number of nodes in AST
 */
export function checkCorePurity(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!isCore(sourceFile)) return [];

	const violations: ArchitectureViolation[] = [];
	sourceFile.forEachDescendant((node) => {
		if (node.getKindName() !== "PropertyAccessExpression") return;
		const text = node.getText();
		for (const { pattern, name } of IMPURE_PATTERNS) {
			if (pattern.test(text)) {
				violations.push({
					file: sourceFile.getFilePath(),
					line: node.getStartLineNumber(),
					rule: "core-purity",
					message: `CORE contains side effect: ${name} (${text})`,
					severity: "error",
				});
			}
		}
	});
	return violations;
}

/**
 * Exported CORE functions carry @pure and @complexity tags.
 *
 * @invariant ∀ f ∈ ExportedCoreFunctions: hasDocumentation(f)
 * @complexity O(n) where n = number of exported functions
 */
export function checkCoreDocumentation(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!isCore(sourceFile)) return [];

	const violations: ArchitectureViolation[] = [];
	for (const func of sourceFile.getFunctions()) {
		if (!func.isExported()) continue;
		const docText = func
			.getJsDocs()
			.map((doc) => doc.getFullText())
			.join("\n");
		const missingTags = ["@pure", "@complexity"].filter(
			(tag) => !docText.includes(tag),
		);
		if (missingTags.length > 0) {
			violations.push({
				file: sourceFile.getFilePath(),
				line: func.getStartLineNumber(),
				rule: "core-documentation",
				message: `Function '${func.getName() ?? "<anonymous>"}' missing tags: ${missingTags.join(", ")}`,
				severity: "warning",
			});
		}
	}
	return violations;
}

/**
 * Run every rule over a set of source files.
 *
 * @complexity O(n * m) where n = files, m = avg nodes per file
 */
export function collectViolations(
	sourceFiles: readonly SourceFile[],
): readonly ArchitectureViolation[] {
	return sourceFiles
		.filter((f) => !f.getFilePath().includes("node_modules"))
		.flatMap((f) => [
			...checkCoreImports(f),
			...checkShellImports(f),
			...checkCorePurity(f),
			...checkCoreDocumentation(f),
		]);
}
