import { NextRequest, NextResponse } from "next/server";
import { getStore } from "@/lib/db";

export async function POST(request: NextRequest) {
  try {
    const body: unknown = await request.json().catch(() => null);
    if (
      typeof body !== "object" ||
      body === null ||
      !("url" in body) ||
      typeof body.url !== "string" ||
      !body.url
    ) {
      return NextResponse.json({ success: false, error: "url is required" }, { status: 400 });
    }
    const url = body.url;
    const sold = "sold" in body ? body.sold : true;
    if (typeof sold !== "boolean") {
      return NextResponse.json({ success: false, error: "sold must be a boolean" }, { status: 400 });
    }

    if (!getStore().setSold(url, sold)) {
      return NextResponse.json({ success: false, error: "Vehicle not found" }, { status: 404 });
    }

    return NextResponse.json({ success: true, url, sold });
  } catch (error) {
    console.error("[api/vehicles/sold] Error:", error);
    return NextResponse.json(
      {
        success: false,
        error: error instanceof Error ? error.message : "Failed to update vehicle",
      },
      { status: 500 }
    );
  }
}
