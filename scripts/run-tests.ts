import fs from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";

async function collectTestFiles(dirPath: string): Promise<string[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const entryPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectTestFiles(entryPath)));
      continue;
    }
    if (!entry.isFile()) {
      continue;
    }
    if (entry.name.endsWith(".test.ts") || entry.name.endsWith(".test.tsx") || entry.name.endsWith(".test.mts")) {
      files.push(entryPath);
    }
  }

  return files;
}

async function collectWorkspaceTestDirs(root: string): Promise<string[]> {
  const packagesDir = path.join(root, "packages");
  const entries = await fs.readdir(packagesDir, { withFileTypes: true });
  const dirs: string[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const testsDir = path.join(packagesDir, entry.name, "__tests__");
    const stat = await fs.stat(testsDir).catch(() => null);
    if (stat?.isDirectory()) {
      dirs.push(testsDir);
    }
  }
  return dirs.sort((a, b) => a.localeCompare(b));
}

function formatRelative(filePath: string) {
  const rel = path.relative(process.cwd(), filePath);
  return rel.length === 0 ? filePath : rel;
}

async function main() {
  const testsDirArg = process.argv[2];
  const testsDirs = testsDirArg ? [path.resolve(process.cwd(), testsDirArg)] : await collectWorkspaceTestDirs(process.cwd());

  const testFiles: string[] = [];
  for (const testsDir of testsDirs) {
    testFiles.push(...(await collectTestFiles(testsDir)).sort((a, b) => a.localeCompare(b)));
  }
  if (testFiles.length === 0) {
    throw new Error(`No test files found under ${testsDirs.map(formatRelative).join(", ") || "packages/*/__tests__"}.`);
  }

  console.log(`[tokenpipe] Running ${testFiles.length} test file(s)...`);

  for (const filePath of testFiles) {
    console.log(`[tokenpipe] → ${formatRelative(filePath)}`);
    await import(pathToFileURL(filePath).href);
  }
}

main()
  .catch((err) => {
    console.error("[tokenpipe] tests failed:", err);
    process.exitCode = 1;
  })
  .finally(() => {
    // Abandoned handles may still hold timers or threads; do not wait on them.
    process.exit();
  });
