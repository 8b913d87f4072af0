import { NextResponse } from "next/server";
import { getStore } from "@/lib/db";
import { renderReport } from "@/lib/report";

export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const store = getStore();
    const html = renderReport({
      vehicles: store.getAllVehicles(),
      histories: store.getAllPriceHistories(),
      stats: store.getStatistics(),
    });
    return new NextResponse(html, {
      headers: { "Content-Type": "text/html; charset=utf-8" },
    });
  } catch (error) {
    console.error("[api/report] Error:", error);
    return NextResponse.json(
      {
        success: false,
        error: error instanceof Error ? error.message : "Report failed",
      },
      { status: 500 }
    );
  }
}
