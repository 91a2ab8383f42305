import { parse } from "yaml";
import { DispatchConfig, resolveParameters } from "./params";
import { planDispatch, renderPlan } from "./plan";

describe("dispatch plan", () => {
    const config: DispatchConfig = {
        params: resolveParameters({ hwNumber: "2", scenarioName: "7a" }),
        workspace: "/ws",
        buildNumber: "42",
    }

    it("names the build and its hosts", () => {
        const plan = planDispatch(config)

        expect(plan.build).toEqual("#42 - 7a - qa2 - openstack-rally")
        expect(plan.hosts).toEqual({ admin: "crowbar2", cloud: "qa2", results: "backup.cloudadm.qa.suse.de" })
    });

    it("lists the operations in the order they run", () => {
        const plan = planDispatch(config)

        expect(plan.operations.map(o => [o.stage, o.op])).toEqual([
            ["preparing", "reset"],
            ["distributing-inputs", "pull"],
            ["distributing-inputs", "pull"],
            ["distributing-inputs", "push"],
            ["running-remote-test", "run"],
            ["archiving-remote-results", "script"],
            ["collecting-artifacts", "pull"],
        ])
    });

    it("places the scenario on the results host before the run", () => {
        const plan = planDispatch(config)

        expect(plan.operations[3]).toEqual({
            stage: "distributing-inputs",
            op: "push",
            host: "backup.cloudadm.qa.suse.de",
            from: "/ws/rally-test.json",
            to: "/root/",
        })
    });

    it("collects into the artifact directory", () => {
        const plan = planDispatch(config)

        expect(plan.operations[6]).toEqual({
            stage: "collecting-artifacts",
            op: "pull",
            host: "backup.cloudadm.qa.suse.de",
            from: "/root/results/*",
            to: "/ws/.artifacts",
        })
    });

    it("renders as yaml", () => {
        expect(parse(renderPlan(config))).toEqual(planDispatch(config))
    });
});
