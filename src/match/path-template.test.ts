import { describe, expect, test } from "vitest";

import {
	decodeRequestPath,
	operationLocator,
	templatePath,
	templateRoute,
} from "./path-template.js";

describe("decodeRequestPath", () => {
	test("turns encoded spaces into plus signs", () => {
		expect(decodeRequestPath("/search/hello%20world")).toBe(
			"/search/hello+world",
		);
		expect(decodeRequestPath("/search/hello+world")).toBe(
			"/search/hello+world",
		);
	});

	test("decodes multi-byte sequences", () => {
		expect(decodeRequestPath("/caf%C3%A9")).toBe("/café");
	});

	test("keeps invalid escapes", () => {
		expect(decodeRequestPath("/bad%zz")).toBe("/bad%zz");
		expect(decodeRequestPath("/bad%C3")).toBe("/bad%C3");
	});
});

describe("templateRoute", () => {
	test("replaces parameter values with their names", () => {
		expect(
			templateRoute({
				path: "/users/123",
				pathParameters: { controller: "users", action: "show", id: "123" },
			}),
		).toBe("/users/{id}");
	});

	test("ignores routing keys", () => {
		expect(
			templateRoute({
				path: "/users",
				pathParameters: { controller: "users", action: "index" },
			}),
		).toBe("/users");
	});

	test("only matches whole segments", () => {
		expect(
			templateRoute({ path: "/v1/users/1", pathParameters: { id: "1" } }),
		).toBe("/v1/users/{id}");
	});

	test("equal values land on their own segments", () => {
		expect(
			templateRoute({
				path: "/users/1/posts/1",
				pathParameters: { user_id: "1", id: "1" },
			}),
		).toBe("/users/{user_id}/posts/{id}");
	});

	test("a value followed by an extension still matches", () => {
		expect(
			templateRoute({
				path: "/users/7.json",
				pathParameters: { id: "7", format: "json" },
			}),
		).toBe("/users/{id}.json");
	});

	test("values with spaces match the plus-normalized path", () => {
		expect(
			templateRoute({
				path: "/tags/big%20deal",
				pathParameters: { name: "big deal" },
			}),
		).toBe("/tags/{name}");
	});

	test("custom routing keys", () => {
		const request = {
			path: "/users/5",
			pathParameters: { resource: "users", id: "5" },
		};
		expect(templateRoute(request)).toBe("/{resource}/{id}");
		expect(templateRoute(request, { routingKeys: ["resource"] })).toBe(
			"/users/{id}",
		);
	});

	test("prefers a document template that expands back to the path", () => {
		const request = {
			path: "/items/items",
			pathParameters: { id: "items" },
		};
		expect(templateRoute(request)).toBe("/{id}/items");
		expect(
			templateRoute(request, { templates: ["/items", "/items/{id}"] }),
		).toBe("/items/{id}");
	});

	test("a template that places every value wins over a partial one", () => {
		expect(
			templateRoute(
				{ path: "/users/7.json", pathParameters: { id: "7", format: "json" } },
				{ templates: ["/users/{id}.json", "/users/{id}.{format}"] },
			),
		).toBe("/users/{id}.{format}");
	});

	test("falls back to substitution when no template fits", () => {
		expect(
			templateRoute(
				{ path: "/users/1/posts/1", pathParameters: { user_id: "1", id: "1" } },
				{ templates: ["/users/{id}"] },
			),
		).toBe("/users/{user_id}/posts/{id}");
	});

	test("unknown segments stay literal", () => {
		expect(
			templateRoute({ path: "/users/123", pathParameters: { id: "999" } }),
		).toBe("/users/123");
	});
});

describe("templatePath", () => {
	test("escapes the templated path as one pointer segment", () => {
		expect(
			templatePath({ path: "/users/123", pathParameters: { id: "123" } }),
		).toBe("~1users~1{id}");
		expect(templatePath({ path: "/files/~home", pathParameters: {} })).toBe(
			"~1files~1~0home",
		);
	});
});

describe("operationLocator", () => {
	test("builds paths/<template>/<verb>", () => {
		expect(
			operationLocator({
				method: "GET",
				path: "/users/123",
				pathParameters: { controller: "users", action: "show", id: "123" },
			}),
		).toBe("paths/~1users~1{id}/get");
	});

	test("lowercases the verb", () => {
		expect(
			operationLocator({ method: "PATCH", path: "/users", pathParameters: {} }),
		).toBe("paths/~1users/patch");
	});
});
