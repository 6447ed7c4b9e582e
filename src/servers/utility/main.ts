import { runServerMain, serveStdio } from "../shared";
import { createUtilityServer } from "./server";

runServerMain("utility", () => serveStdio("utility", createUtilityServer()));
