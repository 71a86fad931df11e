import { QuestEngineApplication } from "./app";
import { AppConfiguration } from "./config";
import { installTimestampedConsole } from "./infra/logging";

async function bootstrap(): Promise<void> {
	const config = AppConfiguration.load();
	installTimestampedConsole(config.logLevel);

	const application = new QuestEngineApplication(config);
	const stop = async () => {
		try {
			await application.dispose();
		} catch (error) {
			console.error("Error while disposing application", error);
		}
	};

	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);

	try {
		await application.initialise();
		application.start();
	} catch (error) {
		console.error("Failed to start quest engine", error);
		process.exitCode = 1;
		await application.dispose();
	}
}

bootstrap().catch((error) => {
	console.error("Fatal startup error", error);
	process.exitCode = 1;
});
