import ora from "ora";
import { z } from "zod";

import type { Ora } from "ora";

import type { Book } from "@/services";

import { ApplicationError, extractErrorMessage } from "@/errors";
import {
	ArchiveService,
	BookService,
	ChunkStatus,
	createTranslator,
	GlossaryService,
	LLMTranslatorService,
	OrchestratorService,
	ProtectorService,
	ReassemblerService,
	SegmenterService,
	SnapshotService,
	TiktokenTokenizer,
} from "@/services";
import {
	logger as __logger,
	env,
	parseCommandLineArgs,
	registerCleanup,
	setupSignalHandlers,
} from "@/utils";

import { name, version } from "../package.json";

const logger = __logger.child({ component: "main" });

const argsSchema = z.object({
	source: z.string({ error: "--source=<path to .epub> is required" }).min(1),
	target: z.string().min(2).default(env.TARGET_LANGUAGE),
	limit: z.coerce.number().int().positive().default(env.CHUNK_TOKEN_LIMIT),
});

type CommandLineOptions = z.infer<typeof argsSchema>;

const spinner = ora();

try {
	const options = parseCommandLineArgs(["--source", "--target", "--limit"], argsSchema);

	logger.info(
		{
			version,
			component: name,
			environment: env.NODE_ENV,
			translator: env.TRANSLATOR,
			source: options.source,
			targetLanguage: options.target,
		},
		"Starting workflow",
	);

	await workflow(options, spinner);

	logger.info("Workflow completed successfully");

	process.exit(0);
} catch (error) {
	spinner.fail(extractErrorMessage(error));

	if (error instanceof ApplicationError) {
		logger.fatal(
			{ error, errorCode: error.code, operation: error.operation, metadata: error.metadata },
			"Workflow failed with ApplicationError",
		);
	} else {
		logger.fatal({ error }, "Workflow failed with unexpected error");
	}

	process.exit(1);
}

/**
 * Parses the book, translates it and packages the result.
 *
 * The snapshot is saved on SIGINT/SIGTERM, so an interrupted run resumes where it stopped.
 */
async function workflow(options: CommandLineOptions, progress: Ora): Promise<void> {
	const tokenizer = new TiktokenTokenizer(env.LLM_MODEL);
	const protector = new ProtectorService({ placeholderLength: env.PLACEHOLDER_LENGTH });
	const segmenter = new SegmenterService({
		limit: options.limit,
		tokenizer,
		placeholderLength: env.PLACEHOLDER_LENGTH,
	});
	const snapshot = new SnapshotService();
	const archive = new ArchiveService();

	progress.start(`Parsing ${options.source}...`);

	const book: Book = await new BookService({ archive, protector, segmenter, snapshot }).parse(
		options.source,
	);

	progress.succeed(`Parsed ${book.items.length} documents of "${book.name}"`);

	const translator = createTranslator({
		kind: env.TRANSLATOR,
		languages: { source: env.SOURCE_LANGUAGE, target: options.target },
		placeholderLength: env.PLACEHOLDER_LENGTH,
		glossary: await new GlossaryService().load(book),
	});

	if (translator instanceof LLMTranslatorService) {
		progress.start("Checking LLM connectivity...");
		await translator.testConnectivity();
		progress.succeed("LLM API reachable");
	}

	setupSignalHandlers((message, error) => {
		logger.error({ error, message }, "Signal handler triggered during cleanup");
	});
	const unregisterCleanup = registerCleanup(async () => {
		await snapshot.save(book);
	});

	const orchestrator = new OrchestratorService(
		{ translator, reassembler: new ReassemblerService(protector), snapshot, archive },
		{
			targetLocale: options.target,
			outputSuffix: env.OUTPUT_SUFFIX ?? options.target,
			concurrency: env.TRANSLATION_CONCURRENCY,
			placeholderLength: env.PLACEHOLDER_LENGTH,
			onProgress: ({ item, index, total }) => {
				progress.text = `Translating ${index}/${total}: ${item}`;
			},
		},
	);

	progress.start("Translating...");

	try {
		const statistics = await orchestrator.run(book);

		progress.succeed(
			`Translated ${statistics.chunks[ChunkStatus.Completed] + statistics.chunks[ChunkStatus.Skipped]}/${statistics.totalChunks} chunks in ${statistics.elapsedTime}: ${statistics.outputPath}`,
		);
	} finally {
		unregisterCleanup();
	}
}
