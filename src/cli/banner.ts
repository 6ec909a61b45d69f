import chalk from "chalk";
import { VERSION } from "../core/models.js";

const ASCII_ART = `
  _               _        _
 (_) ___   ___   | |_ _ __(_) __ _  __ _  ___
 | |/ _ \\ / __|  | __| '__| |/ _\` |/ _\` |/ _ \\
 | | (_) | (__   | |_| |  | | (_| | (_| |  __/
 |_|\\___/ \\___|   \\__|_|  |_|\\__,_|\\__, |\\___|
                                   |___/`;

export function printBanner(targets: number): void {
  console.error(chalk.cyan(ASCII_ART));
  console.error("");
  console.error(chalk.bold("  ioc-triage") + chalk.dim(` — appliance image IOC checks v${VERSION}`));
  console.error(chalk.dim(`  ${targets} target${targets === 1 ? "" : "s"} queued`));
  console.error("");
}
