import { NextResponse } from "next/server";
import { getStore } from "@/lib/db";
import { toCsv } from "@/lib/csv";

export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const vehicles = getStore().getAllVehicles().filter((v) => v.isAvailable);
    const date = new Date().toISOString().slice(0, 10);

    return new NextResponse(toCsv(vehicles), {
      headers: {
        "Content-Type": "text/csv; charset=utf-8",
        "Content-Disposition": `attachment; filename="megane_listings_${date}.csv"`,
      },
    });
  } catch (error) {
    console.error("[api/vehicles/export] Error:", error);
    return NextResponse.json(
      {
        success: false,
        error: error instanceof Error ? error.message : "Export failed",
      },
      { status: 500 }
    );
  }
}
