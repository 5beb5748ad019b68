import { NextRequest, NextResponse } from "next/server";
import { requestProtocol, securityHeaders, shouldForceHttps } from "@/lib/security";

export function middleware(req: NextRequest) {
  const forceHttps = shouldForceHttps();
  if (forceHttps && requestProtocol(req.headers, req.nextUrl.protocol) === "http:") {
    const url = req.nextUrl.clone();
    url.protocol = "https:";
    return NextResponse.redirect(url, 308);
  }

  const res = NextResponse.next();
  for (const [name, value] of Object.entries(securityHeaders(forceHttps))) {
    res.headers.set(name, value);
  }
  return res;
}

export const config = {
  matcher: ["/((?!_next/static|_next/image|favicon.ico).*)"],
};
