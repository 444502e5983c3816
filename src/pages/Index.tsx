import SieveWorkspace from "@/components/SieveWorkspace";

const Index = () => <SieveWorkspace />;

export default Index;
