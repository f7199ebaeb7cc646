import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { CapacityError, PodApiError, ValidationError } from "../../errors.js";
import { ClusterReconciler, parseRegion } from "../cluster-reconciler.js";
import { InstanceDirectory } from "../instance-directory.js";
import { FakePodApi, silentLog, testCatalog } from "./helpers/fake-pod-api.js";

const H100 = { instanceType: "datacrunch__1xH100_80GB__30__120" };

function setup(options: { maxConvergePolls?: number } = {}) {
  const api = new FakePodApi();
  const client = api.client();
  const reconciler = new ClusterReconciler({
    client,
    directory: new InstanceDirectory(client),
    catalog: testCatalog(),
    log: silentLog,
    sleep: api.sleep,
    maxConvergePolls: options.maxConvergePolls,
  });
  return { api, reconciler };
}

describe("parseRegion", () => {
  it("treats the placeholder as unconstrained", () => {
    assert.deepEqual(parseRegion("PLACEHOLDER"), { country: null, dataCenterId: null });
  });

  it("splits at the first separator only", () => {
    assert.deepEqual(parseRegion("US - dc-7"), { country: "US", dataCenterId: "dc-7" });
    assert.deepEqual(parseRegion("FI - hel - 2"), { country: "FI", dataCenterId: "hel - 2" });
  });

  it("uses an empty datacenter when there is no separator", () => {
    assert.deepEqual(parseRegion("US"), { country: "US", dataCenterId: "" });
  });
});

describe("ClusterReconciler", () => {
  it("launches a head and a worker into an empty cluster", async () => {
    const { api, reconciler } = setup();

    const record = await reconciler.reconcile("train", 2, H100, "PLACEHOLDER");

    assert.deepEqual(record, {
      providerName: "primeintellect",
      clusterName: "train",
      region: "PLACEHOLDER",
      zone: null,
      headInstanceId: "pod-1",
      resumedInstanceIds: [],
      createdInstanceIds: ["pod-1", "pod-2"],
    });
    assert.deepEqual(
      api.created.map((c) => c.pod.name),
      ["train-head", "train-worker"],
    );
    assert.deepEqual(api.created[0], {
      pod: {
        name: "train-head",
        cloudId: "1H100.80S.30V",
        socket: "PCIe",
        gpuType: "H100_80GB",
        gpuCount: 1,
        diskSize: 120,
        country: null,
        dataCenterId: null,
      },
      provider: { type: "datacrunch" },
    });
    assert.deepEqual(api.sleeps, [5_000]);
  });

  it("names exactly one new pod as head", async () => {
    const { api, reconciler } = setup();

    await reconciler.reconcile("train", 4, H100, "PLACEHOLDER");

    assert.deepEqual(
      api.created.map((c) => c.pod.name),
      ["train-head", "train-worker", "train-worker", "train-worker"],
    );
  });

  it("only adds workers when the head is already active", async () => {
    const { api, reconciler } = setup();
    api.addPod({ id: "head-1", name: "train-head", status: "ACTIVE" });
    api.addPod({ id: "worker-1", name: "train-worker", status: "ACTIVE" });

    const record = await reconciler.reconcile("train", 3, H100, "PLACEHOLDER");

    assert.equal(record.headInstanceId, "head-1");
    assert.deepEqual(record.createdInstanceIds, ["pod-1"]);
    assert.deepEqual(
      api.created.map((c) => c.pod.name),
      ["train-worker"],
    );
  });

  it("launches nothing when the cluster is already at target", async () => {
    const { api, reconciler } = setup();
    api.addPod({ id: "head-1", name: "train-head", status: "ACTIVE" });
    api.addPod({ id: "worker-1", name: "train-worker", status: "ACTIVE" });

    const record = await reconciler.reconcile("train", 2, H100, "PLACEHOLDER");

    assert.equal(record.headInstanceId, "head-1");
    assert.deepEqual(record.createdInstanceIds, []);
    assert.deepEqual(api.created, []);
    assert.deepEqual(api.sleeps, []);
  });

  it("adopts an active pod as head when none is named head", async () => {
    const { reconciler, api } = setup();
    api.addPod({ id: "worker-1", name: "train-worker", status: "ACTIVE" });
    api.addPod({ id: "worker-2", name: "train-worker", status: "ACTIVE" });

    const record = await reconciler.reconcile("train", 2, H100, "PLACEHOLDER");

    assert.equal(record.headInstanceId, "worker-1");
  });

  it("launches only workers when an active pod stands in for the head", async () => {
    const { reconciler, api } = setup();
    api.addPod({ id: "worker-1", name: "train-worker", status: "ACTIVE" });

    const record = await reconciler.reconcile("train", 3, H100, "PLACEHOLDER");

    assert.equal(record.headInstanceId, "worker-1");
    assert.deepEqual(
      api.created.map((c) => c.pod.name),
      ["train-worker", "train-worker"],
    );
  });

  it("returns nothing new when reconciled twice", async () => {
    const { api, reconciler } = setup();

    const first = await reconciler.reconcile("train", 2, H100, "PLACEHOLDER");
    const second = await reconciler.reconcile("train", 2, H100, "PLACEHOLDER");

    assert.deepEqual(second.createdInstanceIds, []);
    assert.equal(second.headInstanceId, first.headInstanceId);
    assert.equal(api.created.length, 2);
  });

  it("fails without launching when more pods are pending than requested", async () => {
    const { api, reconciler } = setup();
    // Listing 1 snapshots pending pods, listing 2 drains; pods appear before the capacity check.
    api.beforeList = (call) => {
      if (call !== 3) return;
      for (let i = 0; i < 3; i++) {
        api.addPod({ name: "train-worker", status: "PENDING" });
      }
    };

    await assert.rejects(reconciler.reconcile("train", 2, H100, "PLACEHOLDER"), {
      name: "CapacityError",
      message: "Cluster train already has 3 nodes, but 2 are required",
    });
    assert.deepEqual(api.created, []);
  });

  it("waits for pending pods and reports them as resumed", async () => {
    const { api, reconciler } = setup();
    api.addPod({ id: "head-1", name: "train-head", status: "ACTIVE" });
    api.addPod({ id: "worker-1", name: "train-worker", status: "PENDING", ticksToActive: 2 });

    const record = await reconciler.reconcile("train", 2, H100, "PLACEHOLDER");

    assert.deepEqual(record.resumedInstanceIds, ["worker-1"]);
    assert.deepEqual(record.createdInstanceIds, []);
    assert.deepEqual(api.sleeps, [5_000, 5_000]);
  });

  it("refuses to shrink a cluster that is over target", async () => {
    const { api, reconciler } = setup();
    api.addPod({ id: "head-1", name: "train-head", status: "ACTIVE" });
    api.addPod({ id: "worker-1", name: "train-worker", status: "ACTIVE" });
    api.addPod({ id: "worker-2", name: "train-worker", status: "ACTIVE" });

    await assert.rejects(reconciler.reconcile("train", 2, H100, "PLACEHOLDER"), (err: unknown) => {
      assert.ok(err instanceof CapacityError);
      assert.equal(err.message, "Cluster train already has 3 nodes, but 2 are required");
      assert.equal(err.observed, 3);
      assert.equal(err.desired, 2);
      return true;
    });
    assert.deepEqual(api.created, []);
    assert.equal(api.pods.size, 3);
  });

  it("sends the region constraint and disk size with each launch", async () => {
    const { api, reconciler } = setup();

    await reconciler.reconcile(
      "train",
      1,
      { instanceType: "datacrunch__CPU_NODE__8__32", diskSize: 200 },
      "US - dc-7",
    );

    assert.deepEqual(api.created[0].pod, {
      name: "train-head",
      cloudId: "CPU.8V.32G",
      socket: "PCIe",
      gpuType: "CPU_NODE",
      gpuCount: 1,
      diskSize: 200,
      country: "US",
      dataCenterId: "dc-7",
    });
  });

  it("rejects an instance type missing from the catalog", async () => {
    const { api, reconciler } = setup();

    await assert.rejects(
      reconciler.reconcile("train", 1, { instanceType: "datacrunch__1xB200__1__1" }, "PLACEHOLDER"),
      ValidationError,
    );
    assert.deepEqual(api.created, []);
  });

  it("rejects an unknown instance type before waiting on pending pods", async () => {
    const { api, reconciler } = setup();
    api.addPod({ id: "p", name: "train-head", status: "PENDING" });

    await assert.rejects(
      reconciler.reconcile("train", 2, { instanceType: "datacrunch__1xB200__1__1" }, "PLACEHOLDER"),
      { name: "ValidationError", message: 'Unknown instance type "datacrunch__1xB200__1__1"' },
    );
    assert.deepEqual(api.sleeps, []);
    assert.equal(api.requestsTo("GET", "/pods").length, 0);
  });

  it("rejects an unknown instance type even when nothing would launch", async () => {
    const { api, reconciler } = setup();
    api.addPod({ id: "h", name: "train-head", status: "ACTIVE" });

    await assert.rejects(
      reconciler.reconcile("train", 1, { instanceType: "datacrunch__1xB200__1__1" }, "PLACEHOLDER"),
      ValidationError,
    );
  });

  it("rejects a non-positive target", async () => {
    const { reconciler } = setup();

    await assert.rejects(reconciler.reconcile("train", 0, H100, "PLACEHOLDER"), {
      name: "ValidationError",
      message: "targetCount must be a positive integer, got 0",
    });
  });

  it("leaves earlier launches in place when a later one fails", async () => {
    const { api, reconciler } = setup();
    api.failCreateAt = 2;

    await assert.rejects(reconciler.reconcile("train", 2, H100, "PLACEHOLDER"), PodApiError);

    assert.deepEqual(
      [...api.pods.values()].map((p) => p.name),
      ["train-head"],
    );
  });

  it("fails with a capacity error when pods never become active", async () => {
    const { api, reconciler } = setup({ maxConvergePolls: 3 });
    api.createTicksToActive = null;

    await assert.rejects(reconciler.reconcile("train", 1, H100, "PLACEHOLDER"), {
      name: "CapacityError",
      message:
        "Failed to bring cluster train to 1 active instances after 3 polls (0 active); " +
        "likely a capacity issue",
    });
    assert.equal(api.sleeps.length, 2);
  });

  it("polls 192 times at 5 second intervals by default before giving up", async () => {
    const { api, reconciler } = setup();
    api.createTicksToActive = null;

    await assert.rejects(reconciler.reconcile("train", 1, H100, "PLACEHOLDER"), {
      name: "CapacityError",
      message:
        "Failed to bring cluster train to 1 active instances after 192 polls (0 active); " +
        "likely a capacity issue",
    });
    assert.equal(api.sleeps.length, 191);
    assert.ok(api.sleeps.every((ms) => ms === 5_000));
  });
});
