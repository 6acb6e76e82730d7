import { ComposeManifestResolver, substituteVariables } from "./index";
import { ValidationError } from "../../shared/utils/error-handling";

const manifest = `
services:
  api:
    image: "shop/api:\${API_TAG:-latest}"
    environment:
      - DB_URL=postgres://db:5432/\${DB_NAME}
      - DEBUG
    ports:
      - "\${API_PORT-8080}:80"
    volumes:
      - data:/var/lib/api
      - ./config:/etc/api
    networks:
      - backend
      - shared
    labels:
      team: payments
    command: serve --port 80
    restart: always
  db:
    image: postgres:15
networks:
  backend: {}
  shared:
    external: true
    name: platform-shared
volumes:
  data: {}
`;

describe("ComposeManifestResolver", () => {
    const resolver = new ComposeManifestResolver();

    describe("substituteVariables", () => {
        it("should substitute plain references and defaults", () => {
            expect(substituteVariables("${A}-${B}", { A: "x", B: "y" })).toBe("x-y");
            expect(substituteVariables("${MISSING}", {})).toBe("");
            expect(substituteVariables("${A:-fallback}", { A: "" })).toBe("fallback");
            expect(substituteVariables("${A-fallback}", { A: "" })).toBe("");
            expect(substituteVariables("${A-fallback}", {})).toBe("fallback");
        });

        it("should keep an escaped dollar", () => {
            expect(substituteVariables("$$HOME and $${A}", { A: "x" })).toBe("$HOME and ${A}");
        });
    });

    describe("parse", () => {
        it("should read services, networks and volumes without substituting", () => {
            const parsed = resolver.parse(manifest);

            expect(parsed.services.map(service => service.name)).toEqual(["api", "db"]);
            expect(parsed.services[0]).toEqual({
                name: "api",
                image: "shop/api:${API_TAG:-latest}",
                environment: { DB_URL: "postgres://db:5432/${DB_NAME}", DEBUG: "" },
                ports: ["${API_PORT-8080}:80"],
                volumes: ["data:/var/lib/api", "./config:/etc/api"],
                networks: ["backend", "shared"],
                labels: { team: "payments" },
                command: ["serve", "--port", "80"],
                restart: "always"
            });
            expect(parsed.networks).toEqual([
                { key: "backend", external: false },
                { key: "shared", external: true, name: "platform-shared" }
            ]);
            expect(parsed.volumes).toEqual(["data"]);
        });

        it("should reject invalid YAML", () => {
            expect(() => resolver.parse("services: [")).toThrow("Invalid YAML");
        });

        it("should require at least one service", () => {
            expect(() => resolver.parse("version: \"3\"\n")).toThrow(ValidationError);
            expect(() => resolver.parse("services: {}\n")).toThrow("Manifest must declare at least one service");
        });

        it("should require an image and a mapping per service", () => {
            expect(() => resolver.parse("services:\n  api:\n    ports: [\"80\"]\n")).toThrow("Service 'api' has no image");
            expect(() => resolver.parse("services:\n  api: nginx\n")).toThrow("Service 'api' must be a mapping");
        });

        it("should reject a service on an undeclared network", () => {
            expect(() => resolver.parse("services:\n  api:\n    image: nginx\n    networks: [front]\n"))
                .toThrow("Service 'api' uses undeclared network 'front'");
        });
    });

    describe("toDeploymentPlan", () => {
        it("should substitute variables and qualify names with the stack", () => {
            const plan = resolver.toDeploymentPlan(resolver.parse(manifest), { DB_NAME: "shop", API_TAG: "" }, "shop api", "1.0.0");

            expect(plan.stackName).toBe("shop_api");
            expect(plan.version).toBe("1.0.0");
            expect(plan.networks).toEqual([
                { name: "shop_api_backend", external: false },
                { name: "platform-shared", external: true }
            ]);
            expect(plan.volumes).toEqual(["shop_api_data"]);
            expect(plan.services[0]).toEqual({
                name: "api",
                containerName: "shop_api_api",
                image: "shop/api:latest",
                environment: { DB_URL: "postgres://db:5432/shop", DEBUG: "" },
                ports: ["8080:80"],
                volumes: ["shop_api_data:/var/lib/api", "./config:/etc/api"],
                networks: ["shop_api_backend", "platform-shared"],
                labels: { team: "payments" },
                command: ["serve", "--port", "80"],
                restartPolicy: "always"
            });
            expect(plan.services[1]).toMatchObject({ containerName: "shop_api_db", image: "postgres:15", networks: [], volumes: [] });
        });

        it("should reject an image that substitutes to nothing", () => {
            const parsed = resolver.parse("services:\n  api:\n    image: \"${IMAGE}\"\n");

            expect(() => resolver.toDeploymentPlan(parsed, {}, "shop", "1.0.0")).toThrow("Service 'api' resolves to an empty image");
        });
    });
});
