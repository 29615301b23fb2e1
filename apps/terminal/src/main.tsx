import { render } from "ink";
import App from "./App";
import { USAGE, UsageError, parseCliArgs, reportFatal, type CliOptions } from "./cli";

const main = async () => {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  if (options.help) {
    console.log(USAGE);
    return;
  }

  const { waitUntilExit } = render(<App demo={options.demo} seed={options.seed} />);
  await waitUntilExit();
};

main().catch(reportFatal);
