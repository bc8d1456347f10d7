import * as esbuild from 'esbuild';
import path from 'path';

const root = path.join(__dirname, '..');

async function build() {
    try {
        // Bundle the CLI; runtime dependencies stay in node_modules
        await esbuild.build({
            entryPoints: [path.join(root, 'src/cli/index.ts')],
            outfile: path.join(root, 'dist/cli/index.js'),
            bundle: true,
            packages: 'external',
            platform: 'node',
            target: 'node20',
            format: 'cjs',
            sourcemap: true,
        });

        console.log('Built dist/cli/index.js');
    } catch (error) {
        console.error('Build failed:', error);
        process.exit(1);
    }
}

void build();
