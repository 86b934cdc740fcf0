import process from "node:process";
import { runCli } from "./runCli";

process.exitCode = runCli(process.argv.slice(2));
