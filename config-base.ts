import * as fs from "fs";
import * as path from "path";

export class ConfigBase {
	protected loadConfig(name: string): Partial<Config.IConfig> {
		const configFileName = this.getConfigPath(name);
		if (!configFileName) {
			return {};
		}

		return JSON.parse(fs.readFileSync(configFileName).toString());
	}

	// The config directory is next to the sources and one level above the compiled files.
	protected getConfigPath(filename: string): string | null {
		const candidates = [path.join(__dirname, "config"), path.join(__dirname, "..", "config")]
			.map(configDir => path.join(configDir, filename + ".json"));

		return _.find(candidates, candidate => fs.existsSync(candidate)) || null;
	}
}
