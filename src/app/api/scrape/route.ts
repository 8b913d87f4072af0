import { NextResponse } from "next/server";
import { crawlRunner } from "@/lib/crawl-runner";

export async function POST() {
  if (!crawlRunner.tryStart()) {
    return NextResponse.json(
      { success: false, message: "Scraper is already running" },
      { status: 409 }
    );
  }

  return NextResponse.json({ success: true, message: "Scraping started" }, { status: 202 });
}
