import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { spawnSync } from 'child_process';
import { structuralForm } from '../src/kicad/structuralSort';

/**
 * Structural diff of two KiCad S-expression files.
 *
 * Both files are parsed, their children sorted by keyword and name, and the
 * canonical forms compared, so reordered properties, pins or pads do not
 * show up as changes. `(pts ...)` and coordinate lists keep their order.
 */

async function main() {
    const args = process.argv.slice(2);
    let isExportMode = false;
    const files: string[] = [];

    for (const arg of args) {
        if (arg === '--export') {
            isExportMode = true;
        } else {
            files.push(arg);
        }
    }

    if (files.length !== 2) {
        console.error('Usage: npm run kicad-diff -- [--export] <fileA> <fileB>');
        process.exit(1);
    }

    const [fileA, fileB] = files;

    for (const file of files) {
        if (!(await fileExists(file))) {
            console.error(`❌  File not found: ${file}`);
            process.exit(1);
        }
    }

    console.log(`🔍 Analyzing structural diff...`);

    const strA = structuralForm(await fs.readFile(fileA, 'utf-8'));
    const strB = structuralForm(await fs.readFile(fileB, 'utf-8'));

    if (isExportMode) {
        const outA = fileA + '.sorted';
        const outB = fileB + '.sorted';
        await fs.writeFile(outA, strA, 'utf-8');
        await fs.writeFile(outB, strB, 'utf-8');
        console.log(`✅ Exported sorted files to:\n  ${outA}\n  ${outB}`);
        process.exit(0);
    }

    if (strA === strB) {
        console.log(`✅ No structural differences.`);
        process.exit(0);
    }

    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kicad-diff-'));
    try {
        const tmpA = path.join(tmpDir, 'A-' + path.basename(fileA));
        const tmpB = path.join(tmpDir, 'B-' + path.basename(fileB));
        await fs.writeFile(tmpA, strA, 'utf-8');
        await fs.writeFile(tmpB, strB, 'utf-8');

        const result = spawnSync('git', ['diff', '--no-index', '--color=always', tmpA, tmpB], { stdio: 'inherit' });
        process.exitCode = result.status ?? 1;
    } finally {
        await fs.rm(tmpDir, { recursive: true, force: true });
    }
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

main().catch(err => {
    console.error(err);
    process.exit(1);
});
