import { NextResponse } from "next/server";
import { getStore } from "@/lib/db";

export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const store = getStore();
    return NextResponse.json({
      success: true,
      vehicles: store.getVehiclesWithHistory(),
      stats: store.getStatistics(),
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    console.error("[api/vehicles] Error:", error);
    return NextResponse.json(
      {
        success: false,
        error: error instanceof Error ? error.message : "Failed to load vehicles",
      },
      { status: 500 }
    );
  }
}
