#!/usr/bin/env node
import * as fs from "fs";
import { Command } from "commander";
import { runAudit, AuditConfigSchema } from "./audit";

const program = new Command();

function urlFromEmail(email: string): string {
  const domain = email.split("@")[1]?.trim();
  if (!domain) {
    throw new Error(`Cannot derive a site from email address: ${email}`);
  }
  return `https://${domain.toLowerCase()}`;
}

program
  .name("site-seo-audit")
  .description("Crawl a website and report technical SEO findings")
  .version("1.0.0")
  .argument("[url]", "The root URL of the site to audit")
  .option("--email <address>", "Audit the site at the domain of this address when no URL is given")
  .option("--maxPages <number>", "Maximum number of pages to fetch", "150")
  .option("--maxDepth <number>", "Maximum link depth from the seeds", "3")
  .option("--concurrency <number>", "Number of concurrent requests", "8")
  .option("--timeoutMs <number>", "Request timeout in milliseconds", "12000")
  .option("--retryTimeoutMs <number>", "Timeout for the single retry in milliseconds", "30000")
  .option("--maxRedirects <number>", "Redirect hops to follow per request", "5")
  .option("--budgetMs <number>", "Wall-clock budget for the whole crawl in milliseconds", "300000")
  .option("--crawlDelayMs <number>", "Minimum delay between requests to one host", "0")
  .option("--userAgent <string>", "User agent string", "site-seo-audit/1.0")
  .option("--ignoreRobots", "Crawl paths that robots.txt disallows")
  .option("--includeSubdomains", "Treat subdomains of the target as the same site")
  .option("--allowPrivateNetworks", "Allow targets that resolve to private addresses")
  .option("--out <file>", "Write the JSON report to a file instead of stdout")
  .action(async (url: string | undefined, options: Record<string, string | boolean | undefined>) => {
    try {
      const str = (key: string): string => {
        const value = options[key];
        return typeof value === "string" ? value : "";
      };

      let target = url;
      if (!target && str("email")) {
        target = urlFromEmail(str("email"));
      }
      if (!target) {
        throw new Error("A URL or --email is required");
      }

      const config = AuditConfigSchema.parse({
        url: target,
        maxPages: parseInt(str("maxPages"), 10),
        maxDepth: parseInt(str("maxDepth"), 10),
        concurrency: parseInt(str("concurrency"), 10),
        timeoutMs: parseInt(str("timeoutMs"), 10),
        retryTimeoutMs: parseInt(str("retryTimeoutMs"), 10),
        maxRedirects: parseInt(str("maxRedirects"), 10),
        wallClockBudgetMs: parseInt(str("budgetMs"), 10),
        crawlDelayMs: parseInt(str("crawlDelayMs"), 10),
        userAgent: str("userAgent"),
        respectRobots: options.ignoreRobots !== true,
        includeSubdomains: options.includeSubdomains === true,
        blockPrivateNetworks: options.allowPrivateNetworks !== true,
      });

      const result = await runAudit(config);
      const json = JSON.stringify(result, null, 2);

      if (str("out")) {
        fs.writeFileSync(str("out"), json + "\n");
      } else {
        console.log(json);
      }

      process.exit(0);
    } catch (error: unknown) {
      console.error(
        JSON.stringify(
          {
            error: true,
            message: error instanceof Error && error.message ? error.message : "Unknown error occurred",
          },
          null,
          2
        )
      );
      process.exit(1);
    }
  });

program.parse();
