#!/usr/bin/env node

import fs from 'fs';
import path from 'path';

import { program } from 'commander';

import { CatalogImportUtilities, isFailure, settleActiveOperations } from '../catalog-import-utilities.js';
import { ConfigurationError } from '../types/import-errors.js';
import { DEFAULT_BATCH_SIZE, DEFAULT_VERSION_TAG } from '../constants/icd10-constants.js';
import { getSupportedVersionTags } from '../constants/coding-standard-registry.js';
import { LogPrefixes } from '../constants/log-prefixes.js';

interface ImportCommandOptions {
	fhirUrl: string;
	versionTag: string;
	batchSize: string;
	dryRun?: boolean;
	verbose?: boolean;
}

let isShuttingDown = false;
const activeOperations: Set<Promise<unknown>> = new Set();
const packageJson = fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf8');
const version: string = JSON.parse(packageJson).version;

const cli = program.version(version)
	.description('ICD-10 diagnosis catalog import utilities.');

cli
	.command('import')
	.description('Import ICD-10 XML catalogs into a FHIR terminology server as diagnosis records, skipping codes that already exist.')
	.argument('<paths...>', 'ICD-10 XML files, or directories to search for them')
	.requiredOption('-u, --fhir-url <fhir_url>', 'URL of the FHIR server to import into')
	.option('-t, --version-tag <tag>', `Coding standard the codes belong to (${getSupportedVersionTags().join(', ')})`, DEFAULT_VERSION_TAG)
	.option('--batch-size <size>', 'Number of created records between progress reports', String(DEFAULT_BATCH_SIZE))
	.option('-d, --dry-run', 'Look up codes but do not write anything')
	.option('-v, --verbose', 'Enable verbose debugging mode')
	.action(async (paths: string[], options: ImportCommandOptions) => {
		const utilities = new CatalogImportUtilities({
			documentPaths: paths.map(safeFilePathFor),
			versionTag: options.versionTag,
			batchSize: Number(options.batchSize),
			fhirUrl: options.fhirUrl,
			dryRun: options.dryRun ?? false,
			verbose: options.verbose ?? false
		});

		console.info(`${LogPrefixes.IMPORT} Importing ${paths.length} path(s) into ${options.fhirUrl}`);
		const importPromise = utilities.importCatalogs();
		activeOperations.add(importPromise);
		try {
			const results = await importPromise;
			if (results.some(isFailure)) {
				process.exitCode = 1;
			}
		} catch (error) {
			if (error instanceof ConfigurationError) {
				error.problems.forEach(problem => console.error(`Invalid option: ${problem}`));
				process.exitCode = 1;
				return;
			}
			throw error;
		} finally {
			activeOperations.delete(importPromise);
		}
	});

cli
	.command('validate')
	.description('Check that a file is a well-formed ICD-10 XML catalog without importing it.')
	.argument('<file_path>', 'ICD-10 XML file')
	.action((filePath: string) => {
		const utilities = new CatalogImportUtilities({ documentPaths: [], versionTag: DEFAULT_VERSION_TAG, batchSize: DEFAULT_BATCH_SIZE, fhirUrl: '', dryRun: true, verbose: false });
		const inspection = utilities.inspectCatalog(safeFilePathFor(filePath));
		if (!inspection.valid) {
			console.error(`${LogPrefixes.CATALOG} ${inspection.filePath} is not valid: ${inspection.error}`);
			process.exitCode = 1;
			return;
		}
		console.info(`${LogPrefixes.CATALOG} ${inspection.filePath}`);
		console.info(`   Root element: ${inspection.rootTag}`);
		console.info(`   Chapters: ${inspection.chapterCount}`);
		console.info(`   Diagnoses: ${inspection.diagnosisCount}`);
		if (!inspection.recognized) {
			console.warn(`${LogPrefixes.CATALOG} File does not look like an ICD-10 catalog`);
			process.exitCode = 1;
		}
	});

cli
	.command('discover')
	.description('List ICD-10 XML catalog files found under a directory.')
	.argument('<directory>', 'Directory to search')
	.action((directory: string) => {
		const utilities = new CatalogImportUtilities({ documentPaths: [], versionTag: DEFAULT_VERSION_TAG, batchSize: DEFAULT_BATCH_SIZE, fhirUrl: '', dryRun: true, verbose: false });
		const files = utilities.findCatalogFiles(safeFilePathFor(directory));
		if (files.length === 0) {
			console.warn(`${LogPrefixes.DISCOVERY} No ICD-10 XML files found in ${directory}`);
			return;
		}
		files.forEach(file => console.info(file));
	});

// Handle SIGINT signal for graceful shutdown
process.on('SIGINT', () => {
	console.info('Received SIGINT signal. Shutting down gracefully...');
	shutdown();
});

// Handle SIGTERM signal for graceful shutdown
process.on('SIGTERM', () => {
	console.info('Received SIGTERM signal. Shutting down gracefully...');
	shutdown();
});

function shutdown() {
	if (isShuttingDown) {
		console.info('Already shutting down, forcing exit...');
		process.exit(1);
	}
	isShuttingDown = true;

	if (activeOperations.size === 0) {
		console.info('No active operations to wait for. Exiting...');
		process.exit(0);
	}

	// A run settles only after it has committed or rolled back
	console.info(`Waiting for ${activeOperations.size} active import to finish...`);
	settleActiveOperations(activeOperations)
		.then(code => {
			console.info('All operations completed. Exiting...');
			process.exit(code !== 0 ? code : process.exitCode ?? 0);
		})
		.catch(() => {
			console.info('Some operations failed to complete. Exiting...');
			process.exit(1);
		});

	setTimeout(() => {
		console.warn('Operations did not complete in time. Forcing exit...');
		process.exit(1);
	}, 10000);
}

program.parseAsync(process.argv).catch(error => {
	console.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
	process.exit(1);
});

function safeFilePathFor(fileName: string) {
	let safePath = fileName;
	if (!path.isAbsolute(fileName)) {
		safePath = path.join(process.cwd(), fileName);
	}
	return safePath;
}
