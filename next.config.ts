import type { NextConfig } from "next";

const nextConfig: NextConfig = {
	// Native bindings and pdf-parse's debug entrypoint break when bundled
	serverExternalPackages: ["better-sqlite3", "pdf-parse"],
};

export default nextConfig;
