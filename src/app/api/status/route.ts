import { NextResponse } from "next/server";
import { crawlRunner } from "@/lib/crawl-runner";

export const dynamic = "force-dynamic";

export async function GET() {
  return NextResponse.json({ success: true, ...crawlRunner.getStatus() });
}
