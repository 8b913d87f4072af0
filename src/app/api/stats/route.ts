import { NextResponse } from "next/server";
import { getStore } from "@/lib/db";

export const dynamic = "force-dynamic";

export async function GET() {
  try {
    return NextResponse.json({ success: true, stats: getStore().getStatistics() });
  } catch (error) {
    console.error("[api/stats] Error:", error);
    return NextResponse.json(
      {
        success: false,
        error: error instanceof Error ? error.message : "Failed to load statistics",
      },
      { status: 500 }
    );
  }
}
